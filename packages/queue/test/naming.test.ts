import { describe, it, expect } from "vitest";
import { deriveName } from "../src/core/naming.js";

describe("deriveName", () => {
  it("names package scripts after the script", () => {
    expect(deriveName("npm run build")).toBe("npm:build");
    expect(deriveName("pnpm run lint --fix")).toBe("pnpm:lint");
  });

  it("names python modules after the module", () => {
    expect(deriveName("python3 -m pytest -x")).toBe("python:pytest");
  });

  it("names interpreter runs after the script file", () => {
    expect(deriveName("node dist/server.js --port 3000")).toBe("node:server.js");
    expect(deriveName("/usr/bin/python3 train.py")).toBe("python3:train.py");
    expect(deriveName("bash ./scripts/deploy.sh prod")).toBe("bash:deploy.sh");
  });

  it("falls back to the command and its first argument", () => {
    expect(deriveName("./scripts/train.sh 3")).toBe("train.sh:3");
    expect(deriveName("ls -la /tmp")).toBe("ls:la");
    expect(deriveName("echo supercalifragilistic")).toBe("echo:supercalifra");
  });

  it("uses a bare command as is", () => {
    expect(deriveName("make")).toBe("make");
    expect(deriveName("  make  ")).toBe("make");
  });
});
