export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful voice assistant. Your replies are converted to speech, ' +
  'so answer in plain spoken sentences and do not use markdown formatting.';
