import { describe, expect, it } from "vitest";
import { OutputBuffer } from "./buffer";

describe("OutputBuffer", () => {
  it("joins writes in order", () => {
    const out = new OutputBuffer();
    out.write("a").line("b").blank(2).line();
    expect(out.toString()).toBe("ab\n\n\n\n");
  });

  it("starts empty", () => {
    expect(new OutputBuffer().toString()).toBe("");
  });
});
