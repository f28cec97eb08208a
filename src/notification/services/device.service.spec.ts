import { Test, TestingModule } from '@nestjs/testing';

import { CONTEXT_STORE } from '../../persistence/interfaces';
import { InMemoryContextStore } from '../../persistence/memory';

import { DeviceService } from './device.service';

describe('DeviceService', () => {
  let service: DeviceService;
  let store: InMemoryContextStore;

  beforeEach(async () => {
    jest.useFakeTimers({ now: new Date('2026-01-01T00:00:00.000Z') });
    store = new InMemoryContextStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [DeviceService, { provide: CONTEXT_STORE, useValue: store }],
    }).compile();

    service = module.get<DeviceService>(DeviceService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should register a device and return a receipt', async () => {
    const receipt = await service.registerDevice({
      userId: 'user-1',
      deviceId: 'phone',
      token: 'test-token-0001',
    });

    expect(receipt).toEqual({
      registrationId: 'user-1_phone',
      expiresAt: '2026-01-31T00:00:00.000Z',
    });
    expect(await service.listDevices('user-1')).toEqual([
      {
        userId: 'user-1',
        deviceId: 'phone',
        token: 'test-token-0001',
        platform: 'mobile',
        registeredAt: '2026-01-01T00:00:00.000Z',
        lastSeenAt: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('should keep the first registration time when a device re-registers', async () => {
    await service.registerDevice({ userId: 'user-1', deviceId: 'phone', token: 'test-token-0001' });
    jest.setSystemTime(new Date('2026-01-05T00:00:00.000Z'));
    await service.registerDevice({
      userId: 'user-1',
      deviceId: 'phone',
      token: 'test-token-0002',
      platform: 'ios',
      appVersion: '2.1.0',
    });

    const [device] = await service.listDevices('user-1');
    expect(device).toMatchObject({
      token: 'test-token-0002',
      platform: 'ios',
      appVersion: '2.1.0',
      registeredAt: '2026-01-01T00:00:00.000Z',
      lastSeenAt: '2026-01-05T00:00:00.000Z',
    });
  });

  it('should reject a short token', async () => {
    await expect(
      service.registerDevice({ userId: 'user-1', deviceId: 'phone', token: 'short' }),
    ).rejects.toThrow('Invalid FCM token provided');
    expect(await service.listDevices('user-1')).toEqual([]);
  });
});
