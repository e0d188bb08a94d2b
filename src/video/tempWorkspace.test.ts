import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { RuntimeAction } from "../runtimeActionLogger.ts";
import { TempWorkspace } from "./tempWorkspace.ts";

async function exists(target: string) {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

async function waitFor(check: () => Promise<boolean>, timeoutMs = 2_000) {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await check()) return;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error("condition not met in time");
}

test("create makes a prefixed directory and listFiles returns sorted file names", async () => {
  const actions: RuntimeAction[] = [];
  const workspace = await TempWorkspace.create("reel-relay-test-", {
    logger: { logAction: (action) => actions.push(action) }
  });
  try {
    assert.equal(path.basename(workspace.dir).startsWith("reel-relay-test-"), true);
    assert.equal(path.dirname(workspace.dir), os.tmpdir());
    await fs.writeFile(workspace.resolve("b.mp4"), "b");
    await fs.writeFile(workspace.resolve("a.webm"), "a");
    await fs.mkdir(workspace.resolve("subdir"));

    assert.deepEqual(await workspace.listFiles(), ["a.webm", "b.mp4"]);
    assert.equal(actions[0]?.kind, "download_tempdir_debug");
  } finally {
    await workspace.remove();
  }
  assert.equal(await exists(workspace.dir), false);
});

test("remove runs once and cancels a pending timer", async () => {
  let calls = 0;
  const actions: RuntimeAction[] = [];
  const workspace = new TempWorkspace("/tmp/reel-relay-fake", {
    logger: { logAction: (action) => actions.push(action) },
    removeDir: async () => {
      calls += 1;
    }
  });

  workspace.scheduleRemoval(60_000);
  assert.notEqual(workspace.removalTimer, null);
  await workspace.remove("response_closed");
  await workspace.remove("timer");

  assert.equal(calls, 1);
  assert.equal(workspace.removalTimer, null);
  assert.deepEqual(actions.map((action) => action.metadata?.reason), ["response_closed"]);
});

test("scheduleRemoval deletes the directory after the delay", async () => {
  const workspace = await TempWorkspace.create("reel-relay-test-");
  await fs.writeFile(workspace.resolve("clip.mp4"), "data");

  workspace.scheduleRemoval(20);
  await waitFor(async () => !(await exists(workspace.dir)));
  assert.equal(workspace.removed, true);
});

test("remove logs a warning when deletion fails", async () => {
  const actions: RuntimeAction[] = [];
  const workspace = new TempWorkspace("/tmp/reel-relay-fake", {
    logger: { logAction: (action) => actions.push(action) },
    removeDir: async () => {
      throw new Error("EBUSY: resource busy");
    }
  });

  await workspace.remove("download_failed");

  assert.equal(actions.length, 1);
  assert.equal(actions[0]?.kind, "download_tempdir_warning");
  assert.deepEqual(actions[0]?.metadata, {
    dir: "/tmp/reel-relay-fake",
    reason: "download_failed",
    error: "EBUSY: resource busy"
  });
});
