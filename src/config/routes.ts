import type { RouteEntry } from '../types/index.js';

/**
 * Default upstream mapping served by the proxy
 */
export const DEFAULT_ROUTES: readonly RouteEntry[] = [
  { prefix: '/anthropic', targetBase: 'https://api.anthropic.com' },
  { prefix: '/claude', targetBase: 'https://api.anthropic.com' },
  { prefix: '/cerebras', targetBase: 'https://api.cerebras.ai' },
  { prefix: '/cohere', targetBase: 'https://api.cohere.ai' },
  { prefix: '/discord', targetBase: 'https://discord.com/api' },
  { prefix: '/fireworks', targetBase: 'https://api.fireworks.ai' },
  { prefix: '/gemini', targetBase: 'https://generativelanguage.googleapis.com' },
  { prefix: '/groq', targetBase: 'https://api.groq.com/openai' },
  { prefix: '/huggingface', targetBase: 'https://api-inference.huggingface.co' },
  { prefix: '/meta', targetBase: 'https://www.meta.ai/api' },
  { prefix: '/novita', targetBase: 'https://api.novita.ai' },
  { prefix: '/nvidia', targetBase: 'https://integrate.api.nvidia.com' },
  { prefix: '/oaipro', targetBase: 'https://api.oaipro.com' },
  { prefix: '/openai', targetBase: 'https://api.openai.com' },
  { prefix: '/openrouter', targetBase: 'https://openrouter.ai/api' },
  { prefix: '/portkey', targetBase: 'https://api.portkey.ai' },
  { prefix: '/reka', targetBase: 'https://api.reka.ai' },
  { prefix: '/telegram', targetBase: 'https://api.telegram.org' },
  { prefix: '/together', targetBase: 'https://api.together.xyz' },
  { prefix: '/xai', targetBase: 'https://api.x.ai' },
  { prefix: '/github', targetBase: 'https://api.github.com' },
];
