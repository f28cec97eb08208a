import { Test, TestingModule } from '@nestjs/testing';

import { ScheduledJob } from '../../persistence/schemas';
import { SchedulerService } from '../../scheduler/scheduler.service';
import { FakePushService } from '../fake/fake-push.service';
import { PUSH_DELIVERY } from '../interfaces';

import { DeviceService } from './device.service';
import { JobDispatcherService } from './job-dispatcher.service';

describe('JobDispatcherService', () => {
  let dispatcher: JobDispatcherService;
  let fakePush: FakePushService;

  const mockScheduler = { registerDispatcher: jest.fn() };
  const mockDeviceService = { listDevices: jest.fn() };

  const device = (deviceId: string, token: string) => ({
    userId: 'user-1',
    deviceId,
    token,
    platform: 'android',
    registeredAt: '2026-01-01T00:00:00.000Z',
    lastSeenAt: '2026-01-01T00:00:00.000Z',
  });

  const job = (payload: Record<string, unknown>): ScheduledJob => ({
    jobId: 'job-1',
    userId: 'user-1',
    triggerTimeUtc: '2026-01-01T07:00:00.000Z',
    payload,
    status: 'scheduled',
    createdAt: '2026-01-01T00:00:00.000Z',
  });

  beforeEach(async () => {
    fakePush = new FakePushService();
    mockScheduler.registerDispatcher.mockReset();
    mockDeviceService.listDevices.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        JobDispatcherService,
        { provide: SchedulerService, useValue: mockScheduler },
        { provide: DeviceService, useValue: mockDeviceService },
        { provide: PUSH_DELIVERY, useValue: fakePush },
      ],
    }).compile();

    dispatcher = module.get<JobDispatcherService>(JobDispatcherService);
  });

  it('should register itself with the scheduler on init', () => {
    dispatcher.onModuleInit();

    expect(mockScheduler.registerDispatcher).toHaveBeenCalledWith(expect.any(Function));
  });

  describe('alarms', () => {
    it('should push to every device of the user', async () => {
      mockDeviceService.listDevices.mockResolvedValue([
        device('a', 'test-token-aaaa'),
        device('b', 'test-token-bbbb'),
      ]);

      await dispatcher.dispatch(job({ kind: 'alarm', tone: 'chime', label: 'Gym' }));

      expect(fakePush.delivered.map((m) => m.token)).toEqual(['test-token-aaaa', 'test-token-bbbb']);
      expect(fakePush.delivered[0]).toEqual({
        token: 'test-token-aaaa',
        title: '⏰ Alarm',
        body: 'Gym',
        data: { type: 'alarm', alarmId: 'job-1', userId: 'user-1', tone: 'chime' },
      });
    });

    it('should use the default body without a label', async () => {
      mockDeviceService.listDevices.mockResolvedValue([device('a', 'test-token-aaaa')]);

      await dispatcher.dispatch(job({ kind: 'alarm', tone: 'default' }));

      expect(fakePush.delivered[0].body).toBe('Time to wake up!');
    });

    it('should succeed when at least one device is reached', async () => {
      mockDeviceService.listDevices.mockResolvedValue([
        device('a', 'test-token-aaaa'),
        device('b', 'test-token-bbbb'),
      ]);
      fakePush.rejectTokens.add('test-token-aaaa');

      await expect(dispatcher.dispatch(job({ kind: 'alarm', tone: 'default' }))).resolves.toBeUndefined();
    });

    it('should fail when every device rejects', async () => {
      mockDeviceService.listDevices.mockResolvedValue([device('a', 'test-token-aaaa')]);
      fakePush.rejectTokens.add('test-token-aaaa');

      await expect(dispatcher.dispatch(job({ kind: 'alarm', tone: 'default' }))).rejects.toThrow(
        'Alarm delivery failed: Token rejected: test-token-aaaa',
      );
    });

    it('should fail when the user has no devices', async () => {
      mockDeviceService.listDevices.mockResolvedValue([]);

      await expect(dispatcher.dispatch(job({ kind: 'alarm', tone: 'default' }))).rejects.toThrow(
        'No registered devices for user-1',
      );
    });
  });

  describe('reminders', () => {
    it('should push to the reminder token with its metadata', async () => {
      await dispatcher.dispatch(
        job({
          kind: 'reminder',
          deviceToken: 'test-token-cccc',
          title: '🔔 Reminder',
          body: 'Call the dentist',
          metadata: { source: 'app' },
        }),
      );

      expect(fakePush.delivered).toEqual([
        {
          token: 'test-token-cccc',
          title: '🔔 Reminder',
          body: 'Call the dentist',
          data: {
            type: 'reminder',
            reminderId: 'job-1',
            userId: 'user-1',
            scheduledTime: '2026-01-01T07:00:00.000Z',
            metadata: '{"source":"app"}',
          },
        },
      ]);
      expect(mockDeviceService.listDevices).not.toHaveBeenCalled();
    });
  });

  it('should reject an unrecognised payload', async () => {
    await expect(dispatcher.dispatch(job({ kind: 'carrier-pigeon' }))).rejects.toThrow(
      'Unrecognised payload for job job-1',
    );
  });
});
