import { describe, expect, it } from "vitest";
import { Err, Ok, PathfindingError, Result } from "../src";

describe("Result", () => {
  it("maps and chains Ok values", () => {
    const res = Ok<number, string>(2)
      .map((n) => n * 3)
      .andThen((n) =>
        n > 5 ? Ok<number, string>(n + 1) : Err<number, string>("too small"),
      );

    expect(res.isOk()).toBe(true);
    expect(res.value).toBe(7);
    expect(res.getOrThrow()).toBe(7);
  });

  it("short-circuits on Err", () => {
    let called = false;
    const res = Err<number, string>("boom").map((n) => {
      called = true;
      return n + 1;
    });

    expect(called).toBe(false);
    expect(res.isErr()).toBe(true);
    expect(res.error).toBe("boom");
    expect(res.getOrElse(-1)).toBe(-1);
    expect(() => res.value).toThrow("Cannot access value of Err Result");
  });

  it("maps errors and matches both branches", () => {
    const res = Err<number, string>("bad").mapErr((e) => e.length);
    expect(res.match((v) => `ok ${v}`, (e) => `err ${e}`)).toBe("err 3");
    expect(Ok(4).match((v) => `ok ${v}`, () => "err")).toBe("ok 4");
  });

  it("serializes to a tagged object", () => {
    expect(Ok(1).toJSON()).toEqual({ success: true, value: 1 });
    expect(Err("x").toJSON()).toEqual({ success: false, error: "x" });
  });

  describe("capture", () => {
    it("captures expected errors as Err", () => {
      const res = Result.capture(() => {
        throw PathfindingError.invalidGrid("broken");
      }, PathfindingError.isPathfindingError);

      expect(res.isErr()).toBe(true);
      expect(res.error.code).toBe("INVALID_GRID");
    });

    it("rethrows anything else", () => {
      expect(() =>
        Result.capture(() => {
          throw new TypeError("not ours");
        }, PathfindingError.isPathfindingError),
      ).toThrow(TypeError);
    });

    it("wraps the return value as Ok", () => {
      const res = Result.capture(() => 42, PathfindingError.isPathfindingError);
      expect(res.isOk()).toBe(true);
      expect(res.value).toBe(42);
    });
  });
});
