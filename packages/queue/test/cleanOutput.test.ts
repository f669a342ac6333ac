import { describe, it, expect } from "vitest";
import { cleanOutput } from "../src/infrastructure/fs/cleanOutput.js";

describe("cleanOutput", () => {
  it("strips ANSI colour codes", () => {
    expect(cleanOutput("\x1b[32mok\x1b[0m")).toBe("ok");
  });

  it("keeps only the last frame of a redrawn line", () => {
    expect(cleanOutput("progress 10%\rprogress 50%\rdone")).toBe("done");
    expect(cleanOutput("saved\r")).toBe("saved");
  });

  it("drops progress bars, spinners and bare counters", () => {
    const raw = ["[=====>    ] 50%", "⠋", "12/40", "real line"].join("\n");
    expect(cleanOutput(raw)).toBe("real line");
  });

  it("collapses runs of blank lines and trims the ends", () => {
    expect(cleanOutput("\n\na\n\n\n\nb\n\n")).toBe("a\n\nb");
  });

  it("keeps ordinary output untouched", () => {
    expect(cleanOutput("line 1\n  indented\nline 3")).toBe("line 1\n  indented\nline 3");
  });
});
