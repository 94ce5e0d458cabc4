import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { FatalSetupError } from "../errors.js";
import { runSync, type SyncOptions } from "../sync.js";
import { captureLogger, fileExists, mkCase, put } from "./util.js";

const T0 = 1_700_000_000_000;

function options(
  source: string,
  target: string,
  extra: Partial<SyncOptions> = {},
): SyncOptions & { printed: string[] } {
  const printed: string[] = [];
  return {
    source,
    target,
    logger: captureLogger().logger,
    print: (text) => printed.push(text),
    printed,
    ...extra,
  };
}

describe("runSync", () => {
  let tmp = "";

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "dirmirror-sync-"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("a dry run prints the plan and changes nothing", async () => {
    const { source, target } = await mkCase(tmp, "dry");
    await put(source, "a/b.txt", "hi", T0);

    const opts = options(source, target, { dryRun: true });
    const outcome = await runSync(opts);
    expect(outcome.status).toBe("dry-run");
    expect(outcome.exitCode).toBe(0);
    expect(
      outcome.plan.actions.map((a) => `${a.kind} ${a.relativePath}`),
    ).toEqual(["add a", "add a/b.txt"]);
    expect(await fsp.readdir(target)).toEqual([]);
    expect(opts.printed).toHaveLength(1);
    expect(
      opts.printed[0].endsWith(
        "Sample actions:\n  [ADD   ] a/\n  [ADD   ] a/b.txt",
      ),
    ).toBe(true);
  });

  test("a second run after applying finds nothing to do", async () => {
    const { source } = await mkCase(tmp, "idempotent");
    const target = path.join(tmp, "idempotent", "not-yet-created");
    await put(source, "docs/readme.md", "# hello", T0);
    await put(source, "top.txt", "top", T0 + 2500);

    const first = await runSync(options(source, target, { yes: true }));
    expect(first.status).toBe("applied");
    expect(first.exitCode).toBe(0);
    expect(first.result?.applied).toBe(3);
    expect(await fsp.readFile(path.join(target, "docs", "readme.md"), "utf8")).toBe(
      "# hello",
    );

    const opts = options(source, target, { yes: true });
    const second = await runSync(opts);
    expect(second.status).toBe("in-sync");
    expect(second.exitCode).toBe(0);
    expect(second.plan.actions).toEqual([]);
    expect(opts.printed).toEqual([]);
  });

  test("declining the confirmation leaves the target untouched", async () => {
    const { source, target } = await mkCase(tmp, "declined");
    await put(source, "new.txt", "n");
    await put(target, "old.txt", "o");
    const confirm = jest.fn(async () => false);

    const outcome = await runSync(options(source, target, { confirm }));
    expect(confirm).toHaveBeenCalledWith("Proceed with synchronization?");
    expect(outcome.status).toBe("declined");
    expect(outcome.exitCode).toBe(0);
    expect(await fsp.readdir(target)).toEqual(["old.txt"]);
  });

  test("accepting the confirmation applies the plan", async () => {
    const { source, target } = await mkCase(tmp, "accepted");
    await put(source, "new.txt", "n");
    await put(target, "old.txt", "o");

    const outcome = await runSync(
      options(source, target, { confirm: async () => true }),
    );
    expect(outcome.status).toBe("applied");
    expect(await fsp.readdir(target)).toEqual(["new.txt"]);
  });

  test("excluded source paths are left out and removed from the target", async () => {
    const { source, target } = await mkCase(tmp, "exclude");
    await put(source, "keep.txt", "k");
    await put(source, "noise.log", "n");
    await put(source, "cache/blob", "b");
    await put(target, "stale.log", "s");

    const outcome = await runSync(
      options(source, target, { yes: true, exclude: ["*.log", "cache/"] }),
    );
    expect(outcome.exitCode).toBe(0);
    expect((await fsp.readdir(target)).sort()).toEqual(["keep.txt"]);
  });

  test("the ignore file in the source is honored and never copied", async () => {
    const { source, target } = await mkCase(tmp, "ignore-file");
    await put(source, ".sync-ignore", "private/\n");
    await put(source, "private/key.txt", "k");
    await put(source, "public.txt", "p");

    await runSync(options(source, target, { yes: true }));
    expect(await fsp.readdir(target)).toEqual(["public.txt"]);
    expect(await fileExists(path.join(target, ".sync-ignore"))).toBe(false);
  });

  describe("links in the target", () => {
    test("a file link is replaced, never written through", async () => {
      const { source, target } = await mkCase(tmp, "file-link");
      const victim = await put(
        path.join(tmp, "file-link", "outside"),
        "victim.txt",
        "PRECIOUS",
      );
      await put(source, "x.txt", "from-source");
      await fsp.symlink(victim, path.join(target, "x.txt"));

      const outcome = await runSync(options(source, target, { yes: true }));
      expect(outcome.exitCode).toBe(0);
      expect(
        outcome.plan.actions.map((a) => `${a.kind} ${a.relativePath}`),
      ).toEqual(["delete x.txt", "add x.txt"]);
      expect(await fsp.readFile(victim, "utf8")).toBe("PRECIOUS");
      const copied = path.join(target, "x.txt");
      expect((await fsp.lstat(copied)).isFile()).toBe(true);
      expect(await fsp.readFile(copied, "utf8")).toBe("from-source");
    });

    test("a directory link is replaced, so nothing lands outside the target", async () => {
      const { source, target } = await mkCase(tmp, "dir-link");
      const outsideDir = path.join(tmp, "dir-link", "outside-dir");
      await fsp.mkdir(outsideDir);
      await put(source, "d/f.txt", "inside");
      await fsp.symlink(outsideDir, path.join(target, "d"));

      const outcome = await runSync(options(source, target, { yes: true }));
      expect(outcome.exitCode).toBe(0);
      expect(await fsp.readdir(outsideDir)).toEqual([]);
      expect((await fsp.lstat(path.join(target, "d"))).isDirectory()).toBe(true);
      expect(await fsp.readFile(path.join(target, "d", "f.txt"), "utf8")).toBe(
        "inside",
      );
    });

    test("a stray link is deleted and the next run is in sync", async () => {
      const { source, target } = await mkCase(tmp, "stray-link");
      await put(source, "keep.txt", "k", T0);
      await put(target, "keep.txt", "k", T0);
      await fsp.symlink("nowhere", path.join(target, "stray"));

      const first = await runSync(options(source, target, { yes: true }));
      expect(
        first.plan.actions.map((a) => `${a.kind} ${a.relativePath}`),
      ).toEqual(["delete stray"]);
      expect(await fsp.readdir(target)).toEqual(["keep.txt"]);

      const second = await runSync(options(source, target, { yes: true }));
      expect(second.status).toBe("in-sync");
    });
  });

  describe("invalid roots", () => {
    test("a missing source", async () => {
      const missing = path.join(tmp, "missing-source");
      await expect(
        runSync(options(missing, path.join(tmp, "t"))),
      ).rejects.toThrow(`source path '${missing}' does not exist`);
    });

    test("a source that is a file", async () => {
      const file = await put(tmp, "source-file.txt", "x");
      await expect(
        runSync(options(file, path.join(tmp, "t"))),
      ).rejects.toThrow(`source path '${file}' is not a directory`);
    });

    test("a target that is a file", async () => {
      const { source } = await mkCase(tmp, "target-file");
      const file = await put(tmp, "target-file.txt", "x");
      await expect(runSync(options(source, file))).rejects.toThrow(
        `target path '${file}' exists but is not a directory`,
      );
    });

    test.each([
      ["the same directory", "."],
      ["a target inside the source", "inner"],
      ["a source inside the target", ".."],
    ])("%s", async (_label, rel) => {
      const { source } = await mkCase(tmp, "nested");
      const target = path.resolve(source, rel);
      await expect(runSync(options(source, target))).rejects.toBeInstanceOf(
        FatalSetupError,
      );
    });
  });
});
