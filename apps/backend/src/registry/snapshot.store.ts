import { Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { isRegistrySnapshot, RegistrySnapshot } from './ledger/registry-state';

/**
 * JSON file persistence for ledger snapshots. Writes are queued so that
 * snapshots land on disk in commit order, and each write replaces the file
 * through a rename.
 */
@Injectable()
export class SnapshotStore {
  private readonly logger = new Logger(SnapshotStore.name);
  private readonly path: string | null;
  private queue: Promise<void> = Promise.resolve();

  constructor(@Inject(ConfigService) private readonly config: ConfigService) {
    const configured = this.config.get<string>('REGISTRY_SNAPSHOT_PATH', '').trim();
    this.path = configured ? resolve(process.cwd(), configured) : null;
  }

  get enabled(): boolean {
    return this.path !== null;
  }

  async load(): Promise<RegistrySnapshot | null> {
    if (!this.path || !existsSync(this.path)) {
      return null;
    }

    const parsed: unknown = JSON.parse(await readFile(this.path, 'utf8'));
    if (!isRegistrySnapshot(parsed)) {
      throw new InternalServerErrorException(`Snapshot at ${this.path} has an unsupported format.`);
    }

    this.logger.log(`Loaded snapshot at sequence ${parsed.sequence} from ${this.path}`);
    return parsed;
  }

  save(snapshot: RegistrySnapshot): Promise<void> {
    const path = this.path;
    if (!path) {
      return Promise.resolve();
    }

    const write = this.queue.then(async () => {
      const temporary = `${path}.tmp`;
      await mkdir(dirname(path), { recursive: true });
      await writeFile(temporary, JSON.stringify(snapshot), 'utf8');
      await rename(temporary, path);
    });

    // a failed write must not block the ones queued after it
    this.queue = write.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Snapshot write failed at sequence ${snapshot.sequence}: ${message}`);
    });

    return write;
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.queue;
  }
}
