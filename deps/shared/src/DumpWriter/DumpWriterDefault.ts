import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private sequence = 0;

  constructor(
    private readonly logger: Logger,
    private readonly dir: string = "dist/dumps"
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    this.sequence++;
    const stamp = format(new Date(), "yyyyMMdd-HHmmss");
    const seq = String(this.sequence).padStart(3, "0");
    const safeName = name.replace(/[\\/:*?"<>|]/g, "_");
    const filePath = path.join(this.dir, `${stamp}-${seq}-${safeName}.json`);
    await mkdir(this.dir, { recursive: true });
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", event: "dump", filePath })`已輸出報告 ${filePath}`;
    return filePath;
  }
}
