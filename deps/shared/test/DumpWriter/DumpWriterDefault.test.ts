import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

describe("DumpWriterDefault", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "dump-writer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("以序號與安全檔名輸出 JSON", async () => {
    const writer = new DumpWriterDefault(buildTestLogger(), dir);
    const first = await writer.dump("plan/a:b", { count: 1 });
    const second = await writer.dump("plan", []);

    expect(path.dirname(first)).toBe(dir);
    expect(path.basename(first)).toMatch(/^\d{8}-\d{6}-001-plan_a_b\.json$/);
    expect(path.basename(second)).toMatch(/^\d{8}-\d{6}-002-plan\.json$/);
    expect(await readFile(first, "utf8")).toBe('{\n  "count": 1\n}');
  });
});
