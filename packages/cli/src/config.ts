import {
  ConfigurationError,
  type DecodeFailurePolicy,
} from '@cascade-voice/core';
import { DEFAULT_SYSTEM_PROMPT, parseOutputFormat } from '@cascade-voice/providers';

export type GenerationProvider = 'anthropic' | 'openai';

const GENERATION_DEFAULTS: Record<GenerationProvider, { apiKey: string; model: string; maxTemperature: number }> = {
  anthropic: { apiKey: 'ANTHROPIC_API_KEY', model: 'claude-haiku-4-5', maxTemperature: 1 },
  openai: { apiKey: 'OPENAI_API_KEY', model: 'gpt-4o-mini', maxTemperature: 2 },
};

export interface AssistantConfig {
  elevenLabsApiKey: string;
  generation: {
    provider: GenerationProvider;
    apiKey: string;
    model: string;
    maxTokens: number;
    temperature: number;
    systemPrompt: string;
  };
  transcription: {
    model: string;
    language?: string;
  };
  capture: {
    sampleRate: number;
    frameMs: number;
  };
  synthesis: {
    voiceId?: string;
    model: string;
    outputFormat: string;
  };
  playback: {
    preBufferBytes: number;
    onDecodeFailure: DecodeFailurePolicy;
  };
  connectTimeoutMs: number;
  cancelPollMs: number;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Read the assistant configuration from environment variables.
 *
 * Every problem is collected first, so one run reports all missing or
 * malformed settings at once.
 *
 * @throws ConfigurationError naming every bad setting
 */
export function loadConfig(env: Env = process.env): AssistantConfig {
  const problems: string[] = [];
  const settings: string[] = [];
  const problem = (name: string, message: string) => {
    settings.push(name);
    problems.push(`${name}: ${message}`);
  };

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problem(name, 'is required');
      return '';
    }
    return value;
  };

  const optional = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const number = (name: string, fallback: number, check: (value: number) => boolean, expected: string): number => {
    const raw = optional(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || !check(value)) {
      problem(name, `must be ${expected}, got "${raw}"`);
      return fallback;
    }
    return value;
  };

  const positiveInt = (name: string, fallback: number) =>
    number(name, fallback, (value) => Number.isInteger(value) && value > 0, 'a positive integer');

  const providerName = optional('GENERATION_PROVIDER') ?? 'anthropic';
  let provider: GenerationProvider = 'anthropic';
  if (providerName === 'anthropic' || providerName === 'openai') {
    provider = providerName;
  } else {
    problem('GENERATION_PROVIDER', `must be "anthropic" or "openai", got "${providerName}"`);
  }
  const defaults = GENERATION_DEFAULTS[provider];

  const elevenLabsApiKey = required('ELEVENLABS_API_KEY');
  const generationApiKey = required(defaults.apiKey);

  const outputFormat = optional('TTS_OUTPUT_FORMAT') ?? 'mp3_44100_128';
  try {
    parseOutputFormat(outputFormat);
  } catch (error: unknown) {
    if (!(error instanceof ConfigurationError)) throw error;
    problem('TTS_OUTPUT_FORMAT', `"${outputFormat}" is not a pcm_<rate> or mp3_<rate>_<kbps> format`);
  }

  const policy = optional('DECODE_FAILURE_POLICY') ?? 'skip';
  let onDecodeFailure: DecodeFailurePolicy = 'skip';
  if (policy === 'skip' || policy === 'fail') {
    onDecodeFailure = policy;
  } else {
    problem('DECODE_FAILURE_POLICY', `must be "skip" or "fail", got "${policy}"`);
  }

  const logLevel = optional('LOG_LEVEL') ?? 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    problem('LOG_LEVEL', `must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const config: AssistantConfig = {
    elevenLabsApiKey,
    generation: {
      provider,
      apiKey: generationApiKey,
      model: optional('GENERATION_MODEL') ?? defaults.model,
      maxTokens: positiveInt('GENERATION_MAX_TOKENS', 1000),
      temperature: number(
        'GENERATION_TEMPERATURE',
        0,
        (value) => value >= 0 && value <= defaults.maxTemperature,
        `between 0 and ${defaults.maxTemperature}`
      ),
      systemPrompt: optional('SYSTEM_PROMPT') ?? DEFAULT_SYSTEM_PROMPT,
    },
    transcription: {
      model: optional('TRANSCRIPTION_MODEL') ?? 'scribe_v2_realtime',
      language: optional('TRANSCRIPTION_LANGUAGE'),
    },
    capture: {
      sampleRate: positiveInt('CAPTURE_SAMPLE_RATE', 16000),
      frameMs: positiveInt('CAPTURE_FRAME_MS', 100),
    },
    synthesis: {
      voiceId: optional('TTS_VOICE_ID'),
      model: optional('TTS_MODEL') ?? 'eleven_turbo_v2_5',
      outputFormat,
    },
    playback: {
      preBufferBytes: number(
        'PLAYBACK_PREBUFFER_BYTES',
        8192,
        (value) => Number.isInteger(value) && value >= 0,
        'a non-negative integer'
      ),
      onDecodeFailure,
    },
    connectTimeoutMs: positiveInt('CONNECT_TIMEOUT_MS', 10000),
    cancelPollMs: positiveInt('CANCEL_POLL_MS', 100),
    logLevel,
  };

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration:\n  ${problems.join('\n  ')}`, settings);
  }
  return config;
}
