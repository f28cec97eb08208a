import { Injectable } from '@nestjs/common';

import { IContextStore } from '../interfaces';
import {
  ConversationTurn,
  RegisteredDevice,
  UserPreferences,
  UserRecord,
  createEmptyUserRecord,
} from '../schemas';

/**
 * Context store kept in process memory. Used by tests and STORAGE_DRIVER=memory.
 */
@Injectable()
export class InMemoryContextStore implements IContextStore {
  private readonly users = new Map<string, UserRecord>();

  async getPreferences(userId: string): Promise<UserPreferences | null> {
    const preferences = this.users.get(userId)?.preferences;
    return preferences ? { ...preferences } : null;
  }

  async putPreferences(userId: string, preferences: UserPreferences): Promise<void> {
    this.record(userId).preferences = { ...preferences };
  }

  async appendTurn(turn: ConversationTurn): Promise<void> {
    this.record(turn.userId).turns.push({ ...turn });
  }

  async recentTurns(userId: string, limit: number): Promise<ConversationTurn[]> {
    const turns = this.users.get(userId)?.turns ?? [];
    if (limit <= 0) {
      return [];
    }
    return turns
      .slice(-limit)
      .reverse()
      .map((turn) => ({ ...turn }));
  }

  async listDevices(userId: string): Promise<RegisteredDevice[]> {
    return (this.users.get(userId)?.devices ?? []).map((device) => ({ ...device }));
  }

  async putDevice(device: RegisteredDevice): Promise<void> {
    const record = this.record(device.userId);
    record.devices = [
      ...record.devices.filter((d) => d.deviceId !== device.deviceId),
      { ...device },
    ];
  }

  private record(userId: string): UserRecord {
    let record = this.users.get(userId);
    if (!record) {
      record = createEmptyUserRecord(userId);
      this.users.set(userId, record);
    }
    return record;
  }
}
