import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { TimeoutError } from '../../common/errors';
import { OPENAI_CLIENT } from '../openai.constants';

import { CompletionService } from './completion.service';

describe('CompletionService', () => {
  let service: CompletionService;
  let mockOpenAi: {
    chat: {
      completions: {
        create: jest.Mock;
      };
    };
  };

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue: unknown) => {
      if (key === 'openai.model') return 'gpt-test';
      if (key === 'openai.timeoutMs') return 1000;
      return defaultValue;
    }),
  };

  const reply = (content: string | null) => ({ choices: [{ message: { content } }] });

  beforeEach(async () => {
    mockOpenAi = { chat: { completions: { create: jest.fn() } } };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CompletionService,
        { provide: OPENAI_CLIENT, useValue: mockOpenAi },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<CompletionService>(CompletionService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should send system and user prompts with sampling settings', async () => {
    mockOpenAi.chat.completions.create.mockResolvedValue(reply('  Hello there.  '));

    const result = await service.complete({
      systemPrompt: 'You are concise.',
      userPrompt: 'Say hello',
      temperature: 0.7,
      maxTokens: 50,
    });

    expect(result).toBe('Hello there.');
    expect(mockOpenAi.chat.completions.create).toHaveBeenCalledWith({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'You are concise.' },
        { role: 'user', content: 'Say hello' },
      ],
      temperature: 0.7,
      max_tokens: 50,
    });
  });

  it('should request a JSON object when asked', async () => {
    mockOpenAi.chat.completions.create.mockResolvedValue(reply('{"ok":true}'));

    await service.complete({
      systemPrompt: 's',
      userPrompt: 'u',
      temperature: 0.3,
      maxTokens: 200,
      json: true,
    });

    expect(mockOpenAi.chat.completions.create).toHaveBeenCalledWith(
      expect.objectContaining({ response_format: { type: 'json_object' } }),
    );
  });

  it('should reject an empty completion', async () => {
    mockOpenAi.chat.completions.create.mockResolvedValue(reply(null));

    await expect(
      service.complete({ systemPrompt: 's', userPrompt: 'u', temperature: 0, maxTokens: 10 }),
    ).rejects.toThrow('Completion returned no content');
  });

  it('should reject with TimeoutError when the call hangs', async () => {
    jest.useFakeTimers();
    mockOpenAi.chat.completions.create.mockReturnValue(new Promise(() => undefined));

    const pending = service.complete({
      systemPrompt: 's',
      userPrompt: 'u',
      temperature: 0,
      maxTokens: 10,
    });
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await jest.advanceTimersByTimeAsync(1000);
    await assertion;
  });
});
