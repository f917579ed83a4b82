import { ExecError, exec, execBuffer, execWithInput } from "../../src/utils/exec.js";

describe("exec", () => {
  it("resolves with stdout for a successful command", async () => {
    const result = await exec("echo hello");
    expect(result).toBe("hello\n");
  });

  it("rejects when command fails", async () => {
    await expect(exec("nonexistent_cmd_xyz_123")).rejects.toThrow(
      /Command failed/
    );
  });

  it("flags a command killed by its timeout", async () => {
    const error = await exec("sleep 10", { timeout: 100 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecError);
    expect(error).toHaveProperty("timedOut", true);
    expect(error).toHaveProperty("message", "Command timed out: sleep 10");
  });

  it("does not flag an ordinary failure as a timeout", async () => {
    const error = await exec("exit 3").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecError);
    expect(error).toHaveProperty("timedOut", false);
  });

  it("carries stderr in the error detail", async () => {
    const error = await exec("echo boom >&2; exit 1").catch((e: unknown) => e);
    expect(error).toHaveProperty("detail", "boom");
  });
});

describe("execBuffer", () => {
  it("resolves with a Buffer for a successful command", async () => {
    const result = await execBuffer("printf binary");
    expect(Buffer.isBuffer(result)).toBe(true);
    expect(result.toString()).toBe("binary");
  });

  it("rejects when command fails", async () => {
    await expect(execBuffer("nonexistent_cmd_xyz_456")).rejects.toThrow(
      /Command failed/
    );
  });
});

describe("execWithInput", () => {
  it("pipes input to stdin", async () => {
    const result = await execWithInput("cat", Buffer.from("piped text"));
    expect(result).toBe("piped text");
  });

  it("rejects when the command fails", async () => {
    await expect(execWithInput("exit 2", Buffer.from("x"))).rejects.toBeInstanceOf(ExecError);
  });
});
