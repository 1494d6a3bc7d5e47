import { describe, it, expect } from "vitest";
import { Context } from "./context.js";
import { integer } from "../numeric/index.js";

describe("Context", () => {
  it("starts with a single global scope and no functions", () => {
    const ctx = new Context();
    expect(ctx.depth).toBe(1);
    expect(ctx.functionNames()).toEqual([]);
    expect(ctx.globals().size).toBe(0);
  });

  it("looks variables up from the innermost scope outwards", () => {
    const ctx = new Context();
    ctx.defineVariable("x", integer(1));
    ctx.pushScope();
    expect(ctx.getVariable("x")).toEqual(integer(1));
    ctx.defineVariable("x", integer(2));
    expect(ctx.getVariable("x")).toEqual(integer(2));
    ctx.popScope();
    expect(ctx.getVariable("x")).toEqual(integer(1));
  });

  it("updates the first existing binding on set", () => {
    const ctx = new Context();
    ctx.setVariable("x", integer(1));
    ctx.pushScope();
    ctx.setVariable("x", integer(5));
    ctx.popScope();
    expect(ctx.getVariable("x")).toEqual(integer(5));
  });

  it("defines unbound names in the innermost scope on set", () => {
    const ctx = new Context();
    ctx.pushScope();
    ctx.setVariable("y", integer(3));
    ctx.popScope();
    expect(ctx.getVariable("y")).toBeUndefined();
  });

  it("never pops the global scope", () => {
    const ctx = new Context();
    ctx.setVariable("x", integer(1));
    ctx.popScope();
    ctx.popScope();
    expect(ctx.depth).toBe(1);
    expect(ctx.getVariable("x")).toEqual(integer(1));
  });

  it("replaces function definitions by name", () => {
    const ctx = new Context();
    const body = { kind: "Variable", name: "x" } as const;
    ctx.defineFunction("f", { params: ["x"], body });
    ctx.defineFunction("f", { params: [], body });
    expect(ctx.getFunction("f")?.params).toEqual([]);
    expect(ctx.functionNames()).toEqual(["f"]);
  });

  it("exposes only the global scope through globals()", () => {
    const ctx = new Context();
    ctx.setVariable("g", integer(1));
    ctx.pushScope();
    ctx.defineVariable("local", integer(2));
    expect(Array.from(ctx.globals().keys())).toEqual(["g"]);
  });
});
