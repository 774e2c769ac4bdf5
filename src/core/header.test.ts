import { describe, it, expect } from "vitest";
import { resolveFunctionName } from "./header";

describe("resolveFunctionName", () => {
  it("resolves name() headers", () => {
    expect(resolveFunctionName("hello() {")).toBe("hello");
    expect(resolveFunctionName("  process_file(){")).toBe("process_file");
    expect(resolveFunctionName("hello () {")).toBe("hello");
    expect(resolveFunctionName("plain() { :; }")).toBe("plain");
  });

  it("resolves function name headers", () => {
    expect(resolveFunctionName("function goodbye")).toBe("goodbye");
    expect(resolveFunctionName("function goodbye {")).toBe("goodbye");
    expect(resolveFunctionName("function   spaced   {")).toBe("spaced");
    expect(resolveFunctionName("function tight{")).toBe("tight");
  });

  it("resolves function name() headers to the token after the keyword", () => {
    expect(resolveFunctionName("function goodbye() {")).toBe("goodbye");
    expect(resolveFunctionName("function goodbye () {")).toBe("goodbye");
  });

  it("returns an empty name for lines that are not headers", () => {
    expect(resolveFunctionName("echo done")).toBe("");
    expect(resolveFunctionName("")).toBe("");
    expect(resolveFunctionName("() {")).toBe("");
  });
});
