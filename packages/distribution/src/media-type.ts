/**
 * MIME media-type parsing for Content-Type / Accept values.
 *
 *   media-type = type ["/" subtype] *( ";" attribute "=" value )
 *   value      = token | quoted-string
 *
 * Type and attribute names are case-insensitive and returned lower-cased.
 */

import { MediaTypeParseError } from "./errors.js";

export interface ParsedMediaType {
  mediaType: string;
  parameters: Record<string, string>;
}

const TSPECIALS = '()<>@,;:\\"/[]?=';

function isTokenChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  if (code <= 0x20 || code >= 0x7f) return false;
  return !TSPECIALS.includes(ch);
}

function isToken(value: string): boolean {
  if (value.length === 0) return false;
  for (const ch of value) {
    if (!isTokenChar(ch)) return false;
  }
  return true;
}

/** Read a leading token; returns [token, rest]. */
function consumeToken(value: string): [string, string] {
  let i = 0;
  while (i < value.length && isTokenChar(value.charAt(i))) i++;
  return [value.slice(0, i), value.slice(i)];
}

/** Read a leading quoted-string; returns [unescaped, rest] or null. */
function consumeQuoted(value: string): [string, string] | null {
  let out = "";
  for (let i = 1; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === '"') return [out, value.slice(i + 1)];
    if (ch === "\\" && i + 1 < value.length) {
      i++;
      out += value.charAt(i);
      continue;
    }
    if (ch === "\r" || ch === "\n") return null;
    out += ch;
  }
  return null;
}

/**
 * Parse a Content-Type header value.
 * A blank header yields the empty media type with no parameters.
 */
export function parseMediaType(header: string): ParsedMediaType {
  const trimmed = header.trim();
  if (trimmed === "") {
    return { mediaType: "", parameters: {} };
  }

  const semi = trimmed.indexOf(";");
  const base = (semi === -1 ? trimmed : trimmed.slice(0, semi)).trim();
  const slash = base.indexOf("/");
  if (slash === -1) {
    if (!isToken(base)) throw new MediaTypeParseError(header, "expected token");
  } else {
    const type = base.slice(0, slash);
    const subtype = base.slice(slash + 1);
    if (!isToken(type)) throw new MediaTypeParseError(header, "expected token after type");
    if (!isToken(subtype)) throw new MediaTypeParseError(header, "expected token after slash");
  }

  const mediaType = base.toLowerCase();
  const parameters: Record<string, string> = {};
  let rest = semi === -1 ? "" : trimmed.slice(semi);

  while (rest.length > 0) {
    rest = rest.trimStart();
    if (!rest.startsWith(";")) {
      throw new MediaTypeParseError(header, "expected ';' between parameters");
    }
    rest = rest.slice(1).trimStart();
    // Trailing semicolons are tolerated.
    if (rest === "") break;

    const [key, afterKey] = consumeToken(rest);
    if (key === "" || !afterKey.trimStart().startsWith("=")) {
      throw new MediaTypeParseError(header, "invalid media parameter");
    }
    rest = afterKey.trimStart().slice(1).trimStart();

    let value: string;
    if (rest.startsWith('"')) {
      const quoted = consumeQuoted(rest);
      if (!quoted) throw new MediaTypeParseError(header, "unterminated quoted string");
      [value, rest] = quoted;
    } else {
      [value, rest] = consumeToken(rest);
      if (value === "") throw new MediaTypeParseError(header, "invalid media parameter");
    }

    const name = key.toLowerCase();
    if (Object.prototype.hasOwnProperty.call(parameters, name)) {
      throw new MediaTypeParseError(header, `duplicate parameter name ${name}`);
    }
    parameters[name] = value;
  }

  return { mediaType, parameters };
}
