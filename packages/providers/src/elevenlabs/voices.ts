import axios, { AxiosError, type AxiosInstance } from 'axios';
import { ConfigurationError, ConnectionError } from '@cascade-voice/core';

export const ELEVENLABS_API_URL = 'https://api.elevenlabs.io';

export interface Voice {
  voiceId: string;
  name: string;
}

export interface VoiceLookupOptions {
  apiKey: string;
  /** @default 'https://api.elevenlabs.io' */
  baseUrl?: string;
  /** @default 10000 */
  timeoutMs?: number;
  /** HTTP client to use; defaults to a fresh axios instance */
  http?: AxiosInstance;
}

/**
 * List the voices available to the account.
 *
 * @throws ConnectionError if the request fails
 */
export async function fetchVoices(options: VoiceLookupOptions): Promise<Voice[]> {
  const http =
    options.http ??
    axios.create({
      baseURL: options.baseUrl ?? ELEVENLABS_API_URL,
      timeout: options.timeoutMs ?? 10000,
    });

  try {
    const response = await http.get<unknown>('/v1/voices', {
      headers: { 'xi-api-key': options.apiKey },
    });
    return parseVoices(response.data);
  } catch (error: unknown) {
    if (error instanceof AxiosError) {
      const status = error.response ? ` (HTTP ${error.response.status})` : '';
      throw new ConnectionError('synthesis', `Could not list voices${status}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Use the configured voice, or the first voice on the account when none is
 * configured.
 *
 * @throws ConfigurationError if no voice is configured and the account has none
 */
export async function resolveVoiceId(options: VoiceLookupOptions & { voiceId?: string }): Promise<Voice> {
  if (options.voiceId) {
    return { voiceId: options.voiceId, name: options.voiceId };
  }
  const [first] = await fetchVoices(options);
  if (!first) {
    throw new ConfigurationError('No voice configured and the account has no voices', ['voiceId']);
  }
  return first;
}

function parseVoices(data: unknown): Voice[] {
  if (typeof data !== 'object' || data === null || !('voices' in data) || !Array.isArray(data.voices)) {
    throw new ConnectionError('synthesis', 'Unexpected response listing voices');
  }
  const voices: Voice[] = [];
  for (const entry of data.voices) {
    if (typeof entry !== 'object' || entry === null) continue;
    const voiceId = 'voice_id' in entry && typeof entry.voice_id === 'string' ? entry.voice_id : undefined;
    const name = 'name' in entry && typeof entry.name === 'string' ? entry.name : voiceId;
    if (voiceId && name) voices.push({ voiceId, name });
  }
  return voices;
}
