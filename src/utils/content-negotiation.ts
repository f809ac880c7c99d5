import type { Context } from 'hono';
import { decodeListJson, encodeListJson } from '../codec/json-codec.js';
import { decodeListXml, encodeListXml } from '../codec/xml-codec.js';
import type { ListSchema } from '../codec/wire-schema.js';
import type { ApiListBase } from '../model/list-base.js';
import type { WireFormat } from '../types.js';

const XML_MEDIA_TYPES = ['application/xml', 'text/xml'];
const JSON_MEDIA_TYPES = ['application/json'];

interface MediaRange {
  type: string;
  q: number;
  index: number;
}

function parseAccept(accept: string): MediaRange[] {
  return accept.split(',').map((part, index) => {
    const [type = '', ...params] = part.split(';');
    let q = 1;
    for (const param of params) {
      const [key = '', value = ''] = param.split('=');
      if (key.trim().toLowerCase() === 'q') {
        const parsed = Number.parseFloat(value.trim());
        if (Number.isFinite(parsed) && parsed >= 0 && parsed <= 1) q = parsed;
      }
    }
    return { type: type.trim().toLowerCase(), q, index };
  });
}

/** Highest-q range among `types`; the earliest wins a tie. */
function bestMatch(ranges: MediaRange[], types: readonly string[]): MediaRange | undefined {
  let best: MediaRange | undefined;
  for (const range of ranges) {
    if (types.includes(range.type) && (!best || range.q > best.q)) best = range;
  }
  return best;
}

/**
 * XML when the client prefers it, JSON otherwise. Ranges are ranked by
 * q value, then by position; `q=0` rules a type out.
 */
export function preferredFormat(accept: string | undefined): WireFormat {
  if (!accept) return 'json';
  const ranges = parseAccept(accept);
  const xml = bestMatch(ranges, XML_MEDIA_TYPES);
  const json = bestMatch(ranges, JSON_MEDIA_TYPES);
  if (!xml || xml.q === 0) return 'json';
  if (!json || json.q === 0) return 'xml';
  if (xml.q !== json.q) return xml.q > json.q ? 'xml' : 'json';
  return xml.index < json.index ? 'xml' : 'json';
}

/** Respond with a list envelope in the format the request negotiated. */
export function respondWithList<T>(c: Context, list: ApiListBase<T>, status: 200 | 201 = 200): Response {
  if (preferredFormat(c.req.header('accept')) === 'xml') {
    return c.body(encodeListXml(list), status, { 'Content-Type': 'application/xml; charset=UTF-8' });
  }
  return c.json(encodeListJson(list), status);
}

/**
 * Read a list envelope from the request body. XML bodies are recognised
 * by Content-Type; everything else is parsed as JSON.
 */
export async function readListBody<T, L>(c: Context, schema: ListSchema<T, L>): Promise<L> {
  const text = await c.req.text();
  const contentType = (c.req.header('content-type') ?? '').toLowerCase();
  if (XML_MEDIA_TYPES.some((t) => contentType.startsWith(t))) {
    return decodeListXml(text, schema);
  }
  return decodeListJson(text, schema);
}
