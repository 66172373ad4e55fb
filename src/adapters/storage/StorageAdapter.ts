import type { StoragePort } from '@/ports/StoragePort';
import { readFileBuffer, readJson, writeFileBuffer, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson(filePath: string): Promise<unknown> {
    return readJson(filePath);
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJson(filePath, data);
  }

  public async readBinary(filePath: string): Promise<Buffer> {
    return readFileBuffer(filePath);
  }

  public async writeBinary(filePath: string, data: Buffer): Promise<void> {
    await writeFileBuffer(filePath, data);
  }
}
