import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { AlarmService } from '../alarm/alarm.service';
import { CommandRouterService } from '../command/command-router.service';
import { CONVERSATION_EVENTS } from '../context/context.constants';
import { ConversationTurnReceivedEvent } from '../context/events';
import { ContextService } from '../context/services';
import { FLIGHT_SEARCH } from '../flights/interfaces';
import { SampleFlightSearchService } from '../flights/services';
import { IntentResolverService } from '../intent/intent-resolver.service';
import { COMPLETION_SERVICE, STT_SERVICE, TTS_SERVICE } from '../openai/interfaces';
import { CONTEXT_STORE, JOB_STORE } from '../persistence/interfaces';
import { InMemoryContextStore, InMemoryJobStore } from '../persistence/memory';
import { ResponseSynthesizerService } from '../response/response-synthesizer.service';
import { TIMER_QUEUE } from '../scheduler/interfaces';
import { SchedulerService } from '../scheduler/scheduler.service';
import { WaitQueueTimer } from '../scheduler/wait-queue-timer';

import { OrchestratorService } from './orchestrator.service';

describe('OrchestratorService', () => {
  let service: OrchestratorService;
  let scheduler: SchedulerService;

  const apology =
    'I apologize, but I encountered an error processing your request. Please try again.';

  const mockStt = { transcribe: jest.fn() };
  const mockTts = { synthesizeSpeech: jest.fn() };
  const mockCompletion = { complete: jest.fn() };
  const mockEventEmitter = { emit: jest.fn() };
  const mockConfigService = {
    get: jest.fn((_key: string, defaultValue: unknown) => defaultValue),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.useFakeTimers({ now: new Date('2026-01-01T06:00:00.000Z') });
    mockTts.synthesizeSpeech.mockResolvedValue('c3BlZWNo');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OrchestratorService,
        IntentResolverService,
        ContextService,
        CommandRouterService,
        ResponseSynthesizerService,
        AlarmService,
        SchedulerService,
        { provide: FLIGHT_SEARCH, useClass: SampleFlightSearchService },
        { provide: CONTEXT_STORE, useValue: new InMemoryContextStore() },
        { provide: JOB_STORE, useValue: new InMemoryJobStore() },
        { provide: TIMER_QUEUE, useValue: new WaitQueueTimer() },
        { provide: STT_SERVICE, useValue: mockStt },
        { provide: TTS_SERVICE, useValue: mockTts },
        { provide: COMPLETION_SERVICE, useValue: mockCompletion },
        { provide: EventEmitter2, useValue: mockEventEmitter },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<OrchestratorService>(OrchestratorService);
    scheduler = module.get<SchedulerService>(SchedulerService);
  });

  afterEach(() => {
    scheduler.onModuleDestroy();
    jest.useRealTimers();
  });

  it('should set an alarm from a text request', async () => {
    const response = await service.processConversation({
      userId: 'user-1',
      text: 'Set an alarm for 7 AM',
    });

    expect(response.success).toBe(true);
    expect(response.textResponse).toBe('Alarm set for 7:00 AM.');
    expect(response.audioResponse).toBe('c3BlZWNo');
    expect(response.intentKind).toBe('set_alarm');
    expect(response.confidence).toBe(0.9);
    expect(response.data).toMatchObject({ status: 'success', alarmTime: '2026-01-01T07:00:00.000Z' });
    expect(mockCompletion.complete).not.toHaveBeenCalled();
    expect(mockTts.synthesizeSpeech).toHaveBeenCalledWith('Alarm set for 7:00 AM.');

    const [job] = scheduler.listForUser('user-1');
    expect(job.status).toBe('scheduled');
    expect(job.triggerTimeUtc).toBe('2026-01-01T07:00:00.000Z');
  });

  it('should ask for the missing flight details', async () => {
    const response = await service.processConversation({
      userId: 'user-1',
      text: 'find flights to nowhere',
    });

    expect(response.success).toBe(true);
    expect(response.intentKind).toBe('search_flights');
    expect(response.textResponse).toBe(
      'I need the following information: source city, destination city, travel date',
    );
    expect(response.data).toEqual({
      status: 'missing_slots',
      missing: ['source city', 'destination city', 'travel date'],
    });
  });

  it('should summarize a flight search', async () => {
    mockCompletion.complete.mockResolvedValue('IndiGo leaves at 5:25 PM for 7200 rupees.');

    const response = await service.processConversation({
      userId: 'user-1',
      text: 'Find flights from Delhi to Mumbai on 25th Dec 2026 in the evening',
    });

    expect(response.textResponse).toBe('IndiGo leaves at 5:25 PM for 7200 rupees.');
    expect(response.data).toMatchObject({ status: 'success', count: 3, date: '2026-12-25' });
  });

  it('should emit the received turn', async () => {
    await service.processConversation({ userId: 'user-1', text: 'Set an alarm for 7 AM' });

    expect(mockEventEmitter.emit).toHaveBeenCalledTimes(1);
    expect(mockEventEmitter.emit).toHaveBeenCalledWith(
      CONVERSATION_EVENTS.TURN_RECEIVED,
      new ConversationTurnReceivedEvent({
        userId: 'user-1',
        text: 'Set an alarm for 7 AM',
        intentKind: 'set_alarm',
        timestamp: '2026-01-01T06:00:00.000Z',
      }),
    );
  });

  it('should transcribe audio before resolving', async () => {
    mockStt.transcribe.mockResolvedValue({
      success: true,
      text: 'Set an alarm for 7 AM',
      language: 'en',
      confidence: 0.95,
    });

    const response = await service.processConversation({
      userId: 'user-1',
      audio: Buffer.from('audio-bytes').toString('base64'),
    });

    expect(mockStt.transcribe).toHaveBeenCalledWith(Buffer.from('audio-bytes'));
    expect(response.textResponse).toBe('Alarm set for 7:00 AM.');
  });

  it('should voice the apology when transcription fails', async () => {
    mockStt.transcribe.mockResolvedValue({ success: false, error: 'Audio too short' });

    const response = await service.processConversation({
      userId: 'user-1',
      audio: Buffer.from('x').toString('base64'),
    });

    expect(response).toEqual({
      success: false,
      textResponse: apology,
      audioResponse: 'c3BlZWNo',
      intentKind: 'error',
      confidence: 0,
      data: { error: 'Audio too short' },
    });
    expect(mockTts.synthesizeSpeech).toHaveBeenCalledWith(apology);
    expect(mockEventEmitter.emit).not.toHaveBeenCalled();
  });

  it('should reject a request with neither text nor audio', async () => {
    const response = await service.processConversation({ userId: 'user-1' });

    expect(response.success).toBe(false);
    expect(response.data).toEqual({ error: "Either 'text' or 'audio' must be provided" });
  });

  it('should still answer when speech synthesis yields nothing', async () => {
    mockTts.synthesizeSpeech.mockResolvedValue(undefined);

    const response = await service.processConversation({
      userId: 'user-1',
      text: 'what is the weather in Paris',
    });

    expect(response.success).toBe(true);
    expect(response.intentKind).toBe('get_weather');
    expect(response.textResponse).toBe("I've processed your request.");
    expect(response.data).toEqual({ status: 'unimplemented' });
    expect(response.audioResponse).toBeUndefined();
  });
});
