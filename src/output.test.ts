import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OutputError } from "./errors.js";
import { writeOutput } from "./output.js";

// Mock fs/promises
vi.mock("node:fs/promises", () => ({
  writeFile: vi.fn(),
}));

// Import mocked fs after vi.mock
import * as fs from "node:fs/promises";

describe("writeOutput", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes to stdout when no file is given", async () => {
    await writeOutput("Foo 5 - http://x/1\n", null);

    expect(process.stdout.write).toHaveBeenCalledWith("Foo 5 - http://x/1\n");
    expect(fs.writeFile).not.toHaveBeenCalled();
  });

  it("writes the whole document to the file", async () => {
    vi.mocked(fs.writeFile).mockResolvedValueOnce(undefined);

    await writeOutput("[]\n", "out/fandoms.json");

    expect(fs.writeFile).toHaveBeenCalledTimes(1);
    expect(fs.writeFile).toHaveBeenCalledWith("out/fandoms.json", "[]\n", "utf-8");
    expect(process.stdout.write).not.toHaveBeenCalled();
  });

  it("wraps write failures in OutputError", async () => {
    vi.mocked(fs.writeFile).mockRejectedValueOnce(new Error("EACCES: permission denied"));

    const result = writeOutput("[]\n", "/root/locked.json");

    await expect(result).rejects.toThrow(OutputError);
    await expect(result).rejects.toMatchObject({
      path: "/root/locked.json",
      message: "Could not open file /root/locked.json for writing: EACCES: permission denied",
    });
  });
});
