import { describe, expect, it } from "vitest";
import { buildSpawnEnv, createCommandDescriptor, formatCommand } from "./command-descriptor.js";

describe("createCommandDescriptor", () => {
  it("copies the command and applies the overlay last", () => {
    const descriptor = createCommandDescriptor(
      { command: "roslaunch", args: ["pkg", "file.launch"], env: { PYTHONUNBUFFERED: "0", ROS_IP: "10.0.0.2" } },
      { PYTHONUNBUFFERED: "1" },
    );

    expect(descriptor).toEqual({
      command: "roslaunch",
      args: ["pkg", "file.launch"],
      env: { PYTHONUNBUFFERED: "1", ROS_IP: "10.0.0.2" },
    });
  });

  it("defaults args and env to empty", () => {
    expect(createCommandDescriptor({ command: "true" })).toEqual({ command: "true", args: [], env: {} });
  });

  it("is frozen and detached from its input", () => {
    const args = ["a"];
    const descriptor = createCommandDescriptor({ command: "echo", args });
    args.push("b");

    expect(descriptor.args).toEqual(["a"]);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.args)).toBe(true);
    expect(Object.isFrozen(descriptor.env)).toBe(true);
  });

  it("rejects a blank command", () => {
    expect(() => createCommandDescriptor({ command: "  " })).toThrow(TypeError);
  });
});

describe("buildSpawnEnv", () => {
  it("layers the descriptor env over the base", () => {
    const descriptor = createCommandDescriptor({ command: "x" }, { PYTHONUNBUFFERED: "1" });
    expect(buildSpawnEnv({ PATH: "/bin", PYTHONUNBUFFERED: "0" }, descriptor)).toEqual({
      PATH: "/bin",
      PYTHONUNBUFFERED: "1",
    });
  });
});

describe("formatCommand", () => {
  it("joins command and args", () => {
    expect(formatCommand(createCommandDescriptor({ command: "roslaunch", args: ["--screen", "a.launch"] }))).toBe(
      "roslaunch --screen a.launch",
    );
  });
});
