import { z } from 'zod';

export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  label: string
): Promise<Response> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return fetch(url, options);
  }
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } catch (err) {
    const name = err instanceof Error ? err.name : '';
    if (name === 'AbortError') {
      throw new Error(`${label} timed out after ${timeoutMs}ms`);
    }
    throw err;
  } finally {
    clearTimeout(timeout);
  }
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: '\'',
  nbsp: '\u00a0',
  copy: '©',
  reg: '®',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”'
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const hex = body[1] === 'x' || body[1] === 'X';
      const code = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      if (!Number.isFinite(code) || code < 0 || code > 0x10ffff) return match;
      return String.fromCodePoint(code);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

export function stripHtml(html: string): string {
  let text = html.replace(/<script[\s\S]*?<\/script>/gi, '');
  text = text.replace(/<style[\s\S]*?<\/style>/gi, '');
  text = text.replace(/<[^>]+>/g, '');
  text = decodeEntities(text).replace(/[ \t]+/g, ' ');
  return text.replace(/\n{3,}/g, '\n\n').trim();
}

const braveResponseSchema = z.object({
  web: z.object({
    results: z.array(z.object({
      title: z.string().nullish(),
      url: z.string().nullish(),
      description: z.string().nullish()
    }).passthrough()).optional()
  }).passthrough().optional()
}).passthrough();

export type WebSearchOptions = {
  apiKey: string;
  endpoint: string;
  timeoutMs: number;
};

export async function webSearch(query: string, count: number, options: WebSearchOptions): Promise<string> {
  if (!options.apiKey) {
    return 'Error: Brave Search API key not configured.';
  }
  const n = Math.min(Math.max(count, 1), 10);
  const params = new URLSearchParams({ q: query, count: String(n) });
  const response = await fetchWithTimeout(`${options.endpoint}?${params.toString()}`, {
    headers: {
      'Accept': 'application/json',
      'X-Subscription-Token': options.apiKey
    }
  }, options.timeoutMs, 'Web search');
  if (!response.ok) {
    throw new Error(`Brave search error (${response.status})`);
  }
  const data = braveResponseSchema.parse(await response.json());
  const results = data.web?.results ?? [];
  if (results.length === 0) {
    return `No results for: ${query}`;
  }
  const lines = [`Search results for: ${query}\n`];
  results.slice(0, n).forEach((item, i) => {
    lines.push(`${i + 1}. ${item.title ?? ''}\n   ${item.url ?? ''}`);
    if (item.description) lines.push(`   ${item.description}`);
  });
  return lines.join('\n');
}

export type WebFetchOptions = {
  timeoutMs: number;
  userAgent: string;
};

export async function webFetch(url: string, maxChars: number, options: WebFetchOptions): Promise<string> {
  const response = await fetchWithTimeout(url, {
    headers: { 'User-Agent': options.userAgent },
    redirect: 'follow'
  }, options.timeoutMs, 'Web fetch');
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`);
  }
  const raw = await response.text();
  const text = stripHtml(raw);
  if (text.length > maxChars) {
    return `${text.slice(0, maxChars)}\n\n[truncated, ${raw.length} chars total]`;
  }
  return text;
}
