/**
 * @cascade-voice/providers
 *
 * Stage implementations for cascade-voice: ElevenLabs speech-to-text and
 * text-to-speech, Anthropic and OpenAI generation, MP3 decoding and local audio devices.
 *
 * @packageDocumentation
 */

// Sockets
export { wsConnector, parseMessage, stringField } from './socket.js';
export type { SocketConnector, SocketConnection, SocketHandlers, ConnectOptions } from './socket.js';

// ElevenLabs
export { ElevenLabsTranscriptionClient, ELEVENLABS_WS_URL } from './elevenlabs/transcription.js';
export type { ElevenLabsTranscriptionOptions } from './elevenlabs/transcription.js';
export { ElevenLabsSynthesisClient, parseOutputFormat } from './elevenlabs/synthesis.js';
export type { ElevenLabsSynthesisOptions, VoiceSettings } from './elevenlabs/synthesis.js';
export { fetchVoices, resolveVoiceId, ELEVENLABS_API_URL } from './elevenlabs/voices.js';
export type { Voice, VoiceLookupOptions } from './elevenlabs/voices.js';

// Generation
export { DEFAULT_SYSTEM_PROMPT } from './prompt.js';
export { AnthropicGenerationClient, toAnthropicFailure } from './anthropic/generation.js';
export type { AnthropicGenerationOptions, MessagesApi } from './anthropic/generation.js';
export { OpenAIGenerationClient, toOpenAIFailure } from './openai/generation.js';
export type { OpenAIGenerationOptions, ChatCompletionsApi } from './openai/generation.js';

// Decoders
export { Mp3Decoder, interleave } from './decoders/mp3.js';
export type { Mp3DecoderOptions, MpegDecoderLike } from './decoders/mp3.js';

// Devices
export { CommandAudioSource } from './devices/command-source.js';
export type { CommandAudioSourceOptions } from './devices/command-source.js';
export { CommandAudioOutput } from './devices/command-output.js';
export type { CommandAudioOutputOptions } from './devices/command-output.js';
export { WavFileSource, WavFileOutput } from './devices/wav-file.js';
export type { WavFileSourceOptions } from './devices/wav-file.js';
export { spawnProcess } from './devices/process.js';
export type { ChildProcessLike, SpawnProcess } from './devices/process.js';
