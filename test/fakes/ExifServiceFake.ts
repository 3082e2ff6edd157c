import { type Result, err, ok } from "~shared/utils/Result";

import type {
  EmbeddedMetadata,
  ExifService,
  MetadataPatch,
  ReadError,
  WriteError,
} from "@/services/ExifService";

export class ExifServiceFake implements ExifService {
  private readonly records: Map<string, Result<EmbeddedMetadata, ReadError>> =
    new Map();
  private readonly writeErrors: Map<string, WriteError> = new Map();
  readonly writes: Array<{ filePath: string; patch: MetadataPatch }> = [];

  async readEmbedded(
    filePath: string
  ): Promise<Result<EmbeddedMetadata, ReadError>> {
    const record = this.records.get(filePath);
    if (!record) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `No such file: ${filePath}`,
      });
    }
    return record;
  }

  async writeMetadata(
    filePath: string,
    patch: MetadataPatch
  ): Promise<Result<void, WriteError>> {
    const error = this.writeErrors.get(filePath);
    if (error) return err(error);
    this.writes.push({ filePath, patch });
    return ok();
  }

  async dispose() {}

  setEmbedded(filePath: string, metadata: Omit<EmbeddedMetadata, "filePath">) {
    this.records.set(filePath, ok({ filePath, ...metadata }));
  }

  setReadError(filePath: string, error: ReadError) {
    this.records.set(filePath, err(error));
  }

  setWriteError(filePath: string, error: WriteError) {
    this.writeErrors.set(filePath, error);
  }
}
