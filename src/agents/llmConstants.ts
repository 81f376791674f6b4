export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const BASE_URL_ENV_VAR = 'BASE_URL';
export const MODEL_ENV_VAR = 'MODEL';
export const DEFAULT_MODEL_NAME = 'gpt-4o-mini';
export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.2;
