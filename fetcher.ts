import iconv from "iconv-lite";
import { appconfig } from "./config";
import type { Config } from "./config";
import { log } from "./logger";

export function isGroupId(identifier: string) {
  return /^-?\d+$/.test(identifier);
}

/**
 * Percent-encodes `text` in a single-byte code page.
 * Returns null when the code page has no byte for some character
 * (iconv-lite would silently put "?" there).
 */
export function encodeLegacy(text: string, encoding: string): string | null {
  const bytes = iconv.encode(text, encoding);
  if (iconv.decode(bytes, encoding) !== text) return null;
  let out = "";
  for (const byte of bytes) {
    const char = String.fromCharCode(byte);
    out += /[A-Za-z0-9_.~-]/.test(char)
      ? char
      : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return out;
}

export class ScheduleFetcher {
  constructor(public source: Config["source"] = appconfig.source) {}

  _decodeHTML(buffer: Buffer) {
    return iconv.decode(buffer, this.source.encoding);
  }
  async _request(url: string, init: RequestInit = {}) {
    try {
      const r = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.source.timeout_ms),
      });
      if (!r.ok) {
        log.warn(`source answered ${r.status} ${r.statusText} (${url})`);
        return null;
      }
      return this._decodeHTML(Buffer.from(await r.arrayBuffer()));
    } catch (err) {
      const e = err as Error;
      log.warn(`failed to fetch ${url}: ${e.message}`);
      return null;
    }
  }
  async fetchById(group_id: string) {
    const url = `${this.source.base_url}?n=${this.source.n}&group=${group_id}`;
    return await this._request(url);
  }
  async fetchByName(group_name: string) {
    const encoded = encodeLegacy(group_name, this.source.encoding);
    if (encoded === null) {
      log.debug(`can't encode group name '${group_name}' to ${this.source.encoding}`);
      return null;
    }
    return await this._request(`${this.source.base_url}?n=${this.source.n}`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: `faculty=0&teacher=&course=0&group=${encoded}&sdate=&edate=&n=${this.source.n}`,
    });
  }
  /** GET for a numeric group id, POST for anything else. */
  async fetch(identifier: string) {
    return isGroupId(identifier)
      ? await this.fetchById(identifier)
      : await this.fetchByName(identifier);
  }
}
