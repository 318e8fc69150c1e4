import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import {
  NOT_INITIALIZED_MESSAGE,
  outputJson,
  outputJsonError,
  reportCommandError,
} from "../../src/utils/json-output.js";
import { NotFoundError } from "../../src/utils/errors.js";

describe("outputJson", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("outputs valid JSON with success and command fields", () => {
    outputJson({ success: true, command: "test" });
    expect(console.log).toHaveBeenCalledTimes(1);
    const output = JSON.parse(vi.mocked(console.log).mock.calls[0][0] as string);
    expect(output.success).toBe(true);
    expect(output.command).toBe("test");
  });

  it("includes extra fields in output", () => {
    outputJson({ success: true, command: "backup", path: "/tmp/students.json.bak", records: 2 });
    const output = JSON.parse(vi.mocked(console.log).mock.calls[0][0] as string);
    expect(output.path).toBe("/tmp/students.json.bak");
    expect(output.records).toBe(2);
  });
});

describe("outputJsonError", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("outputs error to stderr with success: false", () => {
    outputJsonError("test", "something went wrong");
    expect(console.error).toHaveBeenCalledTimes(1);
    const output = JSON.parse(vi.mocked(console.error).mock.calls[0][0] as string);
    expect(output).toEqual({ success: false, command: "test", error: "something went wrong" });
  });
});

describe("reportCommandError", () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    chalk.level = level;
    process.exitCode = undefined;
  });

  it("prints the error message and sets the exit code", () => {
    reportCommandError("delete", new NotFoundError("9", "No student at position 9."), false);
    expect(console.error).toHaveBeenCalledWith("Error: No student at position 9.");
    expect(process.exitCode).toBe(1);
  });

  it("explains a missing .roster/ directory", () => {
    const err = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
    reportCommandError("list", err, true);
    const output = JSON.parse(vi.mocked(console.error).mock.calls[0][0] as string);
    expect(output).toEqual({ success: false, command: "list", error: NOT_INITIALIZED_MESSAGE });
  });
});
