import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FinderContext } from "../../packages/runtime/src/finder.js";
import type { TaskMessage } from "../../packages/runtime/src/messages.js";
import {
  createInteractiveState,
  pumpMessages,
} from "../../packages/runtime/src/session.js";
import { startTestFinder, type TestFinder } from "./helpers/finder.js";

async function settle(finder: FinderContext): Promise<TaskMessage[]> {
  await finder.idle();
  return finder.channel.drain();
}

describe("Scan, import and search (e2e)", () => {
  let env: TestFinder;

  beforeEach(async () => {
    env = await startTestFinder();
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it("finds a document by its identifier", async () => {
    await env.addFile("HH001_document.tif");
    const { finder } = env;

    finder.scan(env.scanRoot);
    await settle(finder);
    finder.search("HH001", 0.7);
    const [message] = await settle(finder);

    if (message.status !== "completed" || message.kind !== "search") {
      throw new Error(`unexpected message ${JSON.stringify(message)}`);
    }
    expect(message.payload.results).toHaveLength(1);
    expect(message.payload.results[0].file.name).toBe("HH001_document.tif");
    expect(message.payload.results[0].score).toBeGreaterThanOrEqual(0.9);
  });

  it("ranks equal scores by normalized name", async () => {
    await env.addFile("batch1/document_ABC123.tiff");
    await env.addFile("batch2/ABC123-file.tif");
    const { finder } = env;

    finder.scan(env.scanRoot);
    await settle(finder);
    finder.search("ABC123", 0.7);
    const [message] = await settle(finder);

    if (message.status !== "completed" || message.kind !== "search") {
      throw new Error(`unexpected message ${JSON.stringify(message)}`);
    }
    expect(message.payload.results.map((r) => [r.file.name, r.score])).toEqual([
      ["ABC123-file.tif", 1],
      ["document_ABC123.tiff", 1],
    ]);
  });

  it("returns no results for an unknown identifier", async () => {
    await env.addFile("HH001_document.tif");
    await env.addFile("ABC123-file.tif");
    const { finder } = env;

    finder.scan(env.scanRoot);
    await settle(finder);

    for (const threshold of [0.5, 0.7, 1]) {
      finder.search("NOTFOUND999", threshold);
      const [message] = await settle(finder);
      expect(message).toMatchObject({ status: "completed", payload: { results: [] } });
    }
  });

  it("importing the same identifiers twice keeps ten", async () => {
    const { finder } = env;
    const rows = Array.from({ length: 10 }, (_, i) => [`HH${String(i).padStart(3, "0")}`]);

    finder.importIdentifiers({ headers: ["hh_id"], rows });
    const [first] = await settle(finder);
    finder.importIdentifiers({ headers: ["hh_id"], rows });
    const [second] = await settle(finder);

    expect(first).toMatchObject({ payload: { imported: 10, skipped: 0 } });
    expect(second).toMatchObject({ payload: { imported: 0, skipped: 10 } });
    expect(finder.store.countReferenceIds()).toBe(10);
  });

  it("rescanning an unchanged root keeps the file count", async () => {
    await env.addFile("HH001.tif");
    await env.addFile("deep/nested/HH002.TIF");
    await env.addFile("readme.txt");
    const { finder } = env;

    finder.scan(env.scanRoot);
    const [first] = await settle(finder);
    finder.scan(env.scanRoot);
    const [second] = await settle(finder);

    expect(first).toMatchObject({ payload: { discovered: 2, indexed: 2, existing: 0 } });
    expect(second).toMatchObject({ payload: { discovered: 2, indexed: 0, existing: 2 } });
    expect(finder.store.countFiles()).toBe(2);
  });

  it("pages through a large result list", async () => {
    const { finder } = env;
    finder.store.upsertFiles(
      Array.from({ length: 1200 }, (_, i) => ({
        path: `/archive/HH001_page${String(i).padStart(4, "0")}.tif`,
        name: `HH001_page${String(i).padStart(4, "0")}.tif`,
        discoveredAt: "2026-01-21T10:00:00.000Z",
      })),
    );

    finder.search("HH001", 0.9);
    await finder.idle();
    const state = pumpMessages(finder.channel, createInteractiveState());

    if (state.search.kind !== "loaded") throw new Error("expected loaded search");
    const { paginator } = state.search;
    expect(paginator.pageCount()).toBe(3);
    expect(paginator.current().length).toBe(500);
    expect(paginator.next().at(0)?.file.name).toBe("HH001_page0500.tif");
    expect(paginator.goTo(2).length).toBe(200);
  });

  it("keeps working after a failure", async () => {
    const { finder } = env;
    await env.addFile("HH001.tif");

    finder.search("   ");
    finder.scan(`${env.scanRoot}/missing`);
    const failures = await settle(finder);
    expect(failures.map((m) => m.status)).toEqual(["failed", "failed"]);

    finder.scan(env.scanRoot);
    const [ok] = await settle(finder);
    expect(ok).toMatchObject({ status: "completed", payload: { indexed: 1 } });
  });
});
