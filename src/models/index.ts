export { OllamaAdapter, OLLAMA_DEFAULT_BASE } from './ollama.js';
export { OpenAICompatibleAdapter, OPENAI_DEFAULT_BASE } from './openai.js';
export { createAdapter, createAdapterLookup } from './provider.js';
export { postJson } from './http.js';
