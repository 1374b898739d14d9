import type { StoragePort, StorageReadResult } from '@/ports/StoragePort';
import { readJson, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public readJson(filePath: string): Promise<StorageReadResult> {
    return readJson(filePath);
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJson(filePath, data);
  }
}
