import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { NodeCommandFileSystem } from "../../src/infrastructure/CommandFileSystem.js";
import { LoggingService } from "../../src/infrastructure/LoggingService.js";
import { CommandRegistry } from "../../src/lib/registry.js";
import { createTempDir } from "../support/index.js";

describe("NodeCommandFileSystem", () => {
  it("lists markdown files directly inside the directory", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, "review.md"), "Review $ARGUMENTS please", "utf8");
    await writeFile(path.join(dir, "deploy.md"), "Deploy", "utf8");
    await writeFile(path.join(dir, "notes.txt"), "not a command", "utf8");
    await mkdir(path.join(dir, "nested"));
    await writeFile(path.join(dir, "nested", "inner.md"), "too deep", "utf8");
    await mkdir(path.join(dir, "folder.md"));

    const fileSystem = new NodeCommandFileSystem();
    expect(fileSystem.listFiles(dir, ".md")).toEqual([path.join(dir, "deploy.md"), path.join(dir, "review.md")]);
    expect(fileSystem.readText(path.join(dir, "review.md"))).toBe("Review $ARGUMENTS please");
  });

  it("rejects files that are not valid UTF-8", async () => {
    const dir = await createTempDir();
    const file = path.join(dir, "bad.md");
    await writeFile(file, Buffer.from([0x52, 0x65, 0xff, 0xfe, 0x20, 0x24]));
    expect(() => new NodeCommandFileSystem().readText(file)).toThrow(TypeError);
  });

  it("reports whether a directory exists", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, "file.md"), "", "utf8");
    const fileSystem = new NodeCommandFileSystem();
    expect(fileSystem.isDirectory(dir)).toBe(true);
    expect(fileSystem.isDirectory(path.join(dir, "file.md"))).toBe(false);
    expect(fileSystem.isDirectory(path.join(dir, "missing"))).toBe(false);
  });

  it("backs a registry loaded from disk", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, "review.md"), "Review $ARGUMENTS please", "utf8");
    await writeFile(path.join(dir, "_draft.md"), "wip", "utf8");
    await writeFile(path.join(dir, "help.md"), "shadowed", "utf8");

    const registry = new CommandRegistry({ commandsDir: dir, logger: new LoggingService() });
    expect([...registry.customCommands.keys()]).toEqual(["review"]);
    expect(registry.resolveInput("/review PR#1")).toMatchObject({ kind: "custom", prompt: "Review PR#1 please" });
  });

  it("skips a corrupt file and keeps the rest", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, "bad.md"), Buffer.from([0x52, 0x65, 0xff, 0xfe, 0x20, 0x24]));
    await writeFile(path.join(dir, "review.md"), "Review $ARGUMENTS please", "utf8");

    const registry = new CommandRegistry({ commandsDir: dir, logger: new LoggingService(), reportUnreadable: false });
    expect(registry.customCommands.has("bad")).toBe(false);
    expect([...registry.customCommands.keys()]).toEqual(["review"]);
    expect(registry.skippedFiles).toMatchObject([
      { name: "bad", filePath: path.join(dir, "bad.md"), reason: "unreadable" },
    ]);
  });

  it("loads nothing from a missing directory", async () => {
    const dir = await createTempDir();
    const registry = new CommandRegistry({ commandsDir: path.join(dir, "commands") });
    expect(registry.customCommands.size).toBe(0);
  });
});
