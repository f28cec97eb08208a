import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { CONTEXT_STORE } from '../../persistence/interfaces';
import { InMemoryContextStore } from '../../persistence/memory';

import { ContextService } from './context.service';

describe('ContextService', () => {
  let service: ContextService;
  let store: InMemoryContextStore;

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue: unknown) => {
      if (key === 'conversation.recentTurnsLimit') return 2;
      return defaultValue;
    }),
  };

  beforeEach(async () => {
    store = new InMemoryContextStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ContextService,
        { provide: CONTEXT_STORE, useValue: store },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<ContextService>(ContextService);
  });

  describe('getUserContext', () => {
    it('should create default preferences on first access', async () => {
      const context = await service.getUserContext('user-1', 'unknown');

      expect(context.preferences).toEqual({
        timezone: 'UTC',
        alarmTone: 'default',
        usualWakeup: null,
        airlinePref: null,
        maxPrice: null,
        seatPref: null,
        flightType: 'any',
      });
      expect(await store.getPreferences('user-1')).toEqual(context.preferences);
      expect(context.recentTurns).toEqual([]);
      expect(context.intentSpecific).toEqual({});
    });

    it('should return recent turns most recent first, bounded by config', async () => {
      for (const [index, text] of ['one', 'two', 'three'].entries()) {
        await service.recordTurn({
          userId: 'user-1',
          text,
          intentKind: 'unknown',
          timestamp: `2026-01-01T00:00:0${index}.000Z`,
        });
      }

      const context = await service.getUserContext('user-1', 'unknown');

      expect(context.recentTurns.map((t) => t.text)).toEqual(['three', 'two']);
    });

    it('should select flight preferences for flight intents', async () => {
      await service.updatePreference('user-1', { airlinePref: 'IndiGo', maxPrice: 9000 });

      const context = await service.getUserContext('user-1', 'search_flights');

      expect(context.intentSpecific).toEqual({
        airlinePref: 'IndiGo',
        maxPrice: 9000,
        seatPref: null,
        flightType: 'any',
      });
    });

    it('should select alarm preferences for alarm intents', async () => {
      const context = await service.getUserContext('user-1', 'set_alarm');

      expect(context.intentSpecific).toEqual({
        timezone: 'UTC',
        alarmTone: 'default',
        usualWakeup: null,
      });
    });

    it('should fall back to defaults when the store fails', async () => {
      jest.spyOn(store, 'getPreferences').mockRejectedValue(new Error('disk unavailable'));

      const context = await service.getUserContext('user-1', 'set_alarm');

      expect(context.preferences.timezone).toBe('UTC');
      expect(context.recentTurns).toEqual([]);
    });
  });

  describe('updatePreference', () => {
    it('should merge a valid update', async () => {
      const updated = await service.updatePreference('user-1', { timezone: 'Asia/Kolkata' });

      expect(updated.timezone).toBe('Asia/Kolkata');
      expect(updated.alarmTone).toBe('default');
      expect((await store.getPreferences('user-1'))?.timezone).toBe('Asia/Kolkata');
    });

    it('should reject an unknown timezone without writing', async () => {
      await expect(service.updatePreference('user-1', { timezone: 'Mars/Olympus' })).rejects.toThrow(
        'timezone: Unknown IANA timezone',
      );
      expect(await store.getPreferences('user-1')).toBeNull();
    });

    it('should reject unknown fields', async () => {
      await expect(service.updatePreference('user-1', { favouriteColour: 'blue' })).rejects.toThrow(
        'Invalid preference update',
      );
    });
  });

  describe('getHistory', () => {
    it('should honour an explicit limit', async () => {
      await service.recordTurn({
        userId: 'user-1',
        text: 'hello',
        intentKind: 'unknown',
        timestamp: '2026-01-01T00:00:00.000Z',
      });

      expect(await service.getHistory('user-1', 10)).toHaveLength(1);
    });
  });
});
