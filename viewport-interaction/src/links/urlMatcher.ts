export interface UrlMatch {
  url: string;
  // Byte offsets into the searched text, end exclusive.
  start: number;
  end: number;
}

const URL_SCHEMES = [
  'https://',
  'http://',
  'mailto:',
  'ftp://',
  'file://',
  'ssh://',
  'git://',
  'tel:',
  'magnet:',
  'ipfs://',
  'ipns://',
  'gemini://',
  'gopher://',
  'news:'
].map(scheme => new TextEncoder().encode(scheme));

const URL_PUNCTUATION = new Set(Array.from("-._~:/?#[]@!$&'()*+,;=%", ch => ch.charCodeAt(0)));

const OPEN_PAREN = 0x28;
const CLOSE_PAREN = 0x29;
const DOT = 0x2e;
const COMMA = 0x2c;

const isUrlByte = (byte: number): boolean =>
  (byte >= 0x30 && byte <= 0x39) ||
  (byte >= 0x41 && byte <= 0x5a) ||
  (byte >= 0x61 && byte <= 0x7a) ||
  URL_PUNCTUATION.has(byte);

const startsWithAt = (text: Uint8Array, prefix: Uint8Array, at: number): boolean => {
  if (at + prefix.length > text.length) {
    return false;
  }
  for (let i = 0; i < prefix.length; i += 1) {
    if (text[at + i] !== prefix[i]) {
      return false;
    }
  }
  return true;
};

// trimUrlEnd drops trailing sentence punctuation and a closing paren that has no opener in the url.
const trimUrlEnd = (text: Uint8Array, start: number, end: number): number => {
  let stop = end;
  while (stop > start) {
    const last = text[stop - 1];
    if (last === DOT || last === COMMA) {
      stop -= 1;
      continue;
    }
    if (last === CLOSE_PAREN) {
      let depth = 0;
      for (let i = start; i < stop; i += 1) {
        if (text[i] === OPEN_PAREN) depth += 1;
        else if (text[i] === CLOSE_PAREN) depth -= 1;
      }
      if (depth < 0) {
        stop -= 1;
        continue;
      }
    }
    break;
  }
  return stop;
};

const decoder = new TextDecoder();

// findUrlMatchAtPosition returns the url whose byte span contains position.
export const findUrlMatchAtPosition = (text: Uint8Array, position: number): UrlMatch | null => {
  if (position < 0 || position >= text.length) {
    return null;
  }

  for (const scheme of URL_SCHEMES) {
    for (let start = 0; start + scheme.length <= text.length; start += 1) {
      if (!startsWithAt(text, scheme, start)) {
        continue;
      }
      if (start > position) {
        break;
      }

      let end = start + scheme.length;
      while (end < text.length && isUrlByte(text[end])) {
        end += 1;
      }
      end = trimUrlEnd(text, start, end);

      if (position >= start && position < end) {
        return { url: decoder.decode(text.subarray(start, end)), start, end };
      }
      start = end - 1;
    }
  }
  return null;
};

export const findUrlMatchInText = (text: string, position: number): UrlMatch | null =>
  findUrlMatchAtPosition(new TextEncoder().encode(text), position);
