import { describe, it, expect } from "vitest";
import { Ok, Err, errorMessage, type Result } from "../src/result.js";

describe("Result", () => {
  describe("Ok / Err", () => {
    it("wraps a value", () => {
      const result = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
    });

    it("wraps an error", () => {
      const result = Err("Command cannot be empty");
      expect(result).toEqual({ ok: false, error: "Command cannot be empty" });
    });

    it("narrows on ok", () => {
      const result: Result<number, string> = Math.random() >= 0 ? Ok(1) : Err("never");
      if (result.ok) {
        expect(result.value).toBe(1);
      } else {
        expect.unreachable();
      }
    });
  });

  describe("errorMessage", () => {
    it("reads Error messages and stringifies the rest", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
      expect(errorMessage(7)).toBe("7");
    });
  });
});
