import { describe, expect, it } from "vitest";
import { lineFieldParser } from "./status-parser.js";

const OUTPUT = ["header:", "  seq: 12", "  state: 9", "state: 5", "mode: idle", "---"].join("\n");

describe("lineFieldParser", () => {
  it("returns the value of the first top-level match", () => {
    expect(lineFieldParser("state")(OUTPUT)).toBe("5");
  });

  it("ignores indented fields", () => {
    expect(lineFieldParser("seq")(OUTPUT)).toBeUndefined();
  });

  it("does not match a key that merely starts with the field name", () => {
    expect(lineFieldParser("state")("state_code: 3\nstate: 4")).toBe("4");
  });

  it("trims the value and stops at the next colon", () => {
    expect(lineFieldParser("state")("state: 5:x")).toBe("5");
    expect(lineFieldParser("stamp")("stamp:  12:30:01  \r\nstate: 1")).toBe("12");
  });

  it("handles CRLF line endings", () => {
    expect(lineFieldParser("state")("mode: idle\r\nstate: 2\r\n")).toBe("2");
  });

  it("returns undefined when the field is absent", () => {
    expect(lineFieldParser("state")("mode: idle")).toBeUndefined();
    expect(lineFieldParser("state")("")).toBeUndefined();
  });

  it("returns an empty string for a key with no value", () => {
    expect(lineFieldParser("state")("state:")).toBe("");
  });
});
