import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { canonicalPath } from "./canonical-path";

describe("canonicalPath", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await realpath(await mkdtemp(path.join(tmpdir(), "unoconv-convert-")));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns existing absolute paths unchanged", async () => {
    const file = path.join(dir, "report.odt");
    await writeFile(file, "content");
    expect(await canonicalPath(file)).toBe(file);
  });

  it("follows symlinks", async () => {
    const target = path.join(dir, "report.odt");
    const link = path.join(dir, "link.odt");
    await writeFile(target, "content");
    await symlink(target, link);
    expect(await canonicalPath(link)).toBe(target);
  });

  it("keeps missing segments on top of the nearest existing ancestor", async () => {
    const missing = path.join(dir, "not", "yet", "report.pdf");
    expect(await canonicalPath(missing)).toBe(missing);
  });

  it("resolves through a symlinked directory for files that do not exist", async () => {
    const realDir = path.join(dir, "real");
    const linkDir = path.join(dir, "linked");
    await mkdir(realDir);
    await symlink(realDir, linkDir);

    expect(await canonicalPath(path.join(linkDir, "report.pdf"))).toBe(
      path.join(realDir, "report.pdf"),
    );
  });

  it("normalizes dot segments", async () => {
    const messy = path.join(dir, "a", "..", "b", ".", "out.pdf");
    expect(await canonicalPath(messy)).toBe(path.join(dir, "b", "out.pdf"));
  });

  it("resolves relative paths against the working directory", async () => {
    const cwd = await realpath(process.cwd());
    expect(await canonicalPath("does-not-exist-9f3a.pdf")).toBe(
      path.join(cwd, "does-not-exist-9f3a.pdf"),
    );
  });
});
