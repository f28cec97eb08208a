import * as path from 'path';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { atomicWriteJson, readJsonFile } from '../../common/utils/atomic-write';
import { KeyedSequencer } from '../../common/utils/keyed-sequencer';
import { IContextStore } from '../interfaces';
import {
  ConversationTurn,
  RegisteredDevice,
  UserPreferences,
  UserRecord,
  createEmptyUserRecord,
  validateUserRecord,
} from '../schemas';

/**
 * Context store backed by one JSON file per user in <dataDir>/users/.
 * Every operation on a user runs through the sequencer, so a read never
 * repopulates the cache with a document a concurrent write has replaced.
 */
@Injectable()
export class FileContextStore implements IContextStore {
  private readonly logger = new Logger(FileContextStore.name);
  private readonly usersDir: string;
  private readonly sequencer = new KeyedSequencer();

  /** Loaded user records */
  private cache: Map<string, UserRecord> = new Map();

  constructor(private readonly configService: ConfigService) {
    const dataDir = this.configService.get<string>('storage.dataDir', './data');
    this.usersDir = path.join(path.resolve(dataDir), 'users');
  }

  async getPreferences(userId: string): Promise<UserPreferences | null> {
    return this.sequencer.run(userId, async () => {
      const { preferences } = await this.load(userId);
      return preferences ? { ...preferences } : null;
    });
  }

  async putPreferences(userId: string, preferences: UserPreferences): Promise<void> {
    await this.update(userId, (record) => {
      record.preferences = { ...preferences };
    });
  }

  async appendTurn(turn: ConversationTurn): Promise<void> {
    await this.update(turn.userId, (record) => {
      record.turns.push({ ...turn });
    });
  }

  async recentTurns(userId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }

    return this.sequencer.run(userId, async () => {
      const { turns } = await this.load(userId);
      return turns
        .slice(-limit)
        .reverse()
        .map((turn) => ({ ...turn }));
    });
  }

  async listDevices(userId: string): Promise<RegisteredDevice[]> {
    return this.sequencer.run(userId, async () => {
      const { devices } = await this.load(userId);
      return devices.map((device) => ({ ...device }));
    });
  }

  async putDevice(device: RegisteredDevice): Promise<void> {
    await this.update(device.userId, (record) => {
      record.devices = [
        ...record.devices.filter((d) => d.deviceId !== device.deviceId),
        { ...device },
      ];
    });
  }

  /**
   * Clear the cache (useful for testing).
   */
  clearCache(): void {
    this.cache.clear();
  }

  private getFilePath(userId: string): string {
    return path.join(this.usersDir, `${encodeURIComponent(userId)}.json`);
  }

  private async load(userId: string): Promise<UserRecord> {
    const cached = this.cache.get(userId);
    if (cached) {
      return cached;
    }

    const data = await readJsonFile(this.getFilePath(userId));
    const record = data === null ? createEmptyUserRecord(userId) : validateUserRecord(data, userId);

    this.cache.set(userId, record);
    return record;
  }

  private update(userId: string, mutate: (record: UserRecord) => void): Promise<void> {
    return this.sequencer.run(userId, async () => {
      const next = structuredClone(await this.load(userId));
      mutate(next);

      await atomicWriteJson(this.getFilePath(userId), next);
      this.cache.set(userId, next);
      this.logger.debug(`Saved user record for ${userId}`);
    });
  }
}
