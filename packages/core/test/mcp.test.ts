import { describe, it, expect } from "vitest";
import { textResponse, errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP responses", () => {
  describe("textResponse", () => {
    it("creates a text-only response", () => {
      expect(textResponse("Added job abc")).toEqual({
        content: [{ type: "text", text: "Added job abc" }],
      });
    });

    it("preserves multiline text", () => {
      const text = "Line 1\nLine 2";
      expect(textResponse(text).content[0].text).toBe(text);
    });
  });

  describe("errorResponse", () => {
    it("prefixes the text and flags isError", () => {
      expect(errorResponse("Job not found: x")).toEqual({
        content: [{ type: "text", text: "Error: Job not found: x" }],
        structuredContent: { success: false, error: "Job not found: x" },
        isError: true,
      });
    });
  });

  describe("successResponse", () => {
    it("adds success to the structured data", () => {
      const response = successResponse("Cleared 2 finished job(s)", { cleared: 2 });
      expect(response.structuredContent).toEqual({ cleared: 2, success: true });
      expect(response.isError).toBeUndefined();
    });
  });

  describe("resultToResponse", () => {
    it("formats a success", () => {
      const response = resultToResponse(Ok("abc"), (id) => textResponse(`Added job ${id}`));
      expect(response.content[0].text).toBe("Added job abc");
    });

    it("turns a string error into an error response", () => {
      const result: Result<string, string> = Err("Command cannot be empty");
      const response = resultToResponse(result, (id) => textResponse(id));
      expect(response.isError).toBe(true);
      expect(response.content[0].text).toBe("Error: Command cannot be empty");
    });

    it("uses the message of an Error", () => {
      const result: Result<string, Error> = Err(new Error("disk full"));
      const response = resultToResponse(result, (id) => textResponse(id));
      expect(response.content[0].text).toBe("Error: disk full");
    });
  });
});
