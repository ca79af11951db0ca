/**
 * Text truncation on code-point boundaries.
 *
 * truncateText limits UTF-16 code units; truncateUtf8 limits encoded bytes
 * for external fields sized in bytes.
 *
 * truncateText counts UTF-16 code units (what String.length reports) so the result
 * never exceeds the limit, but a surrogate pair is never cut in half: if the
 * cut would land between a high and low surrogate, the high one is dropped too.
 */

export function truncateText(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;

  let end = maxLength;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    end -= 1;
  }
  return text.slice(0, end);
}

/** Longest prefix of whole code points whose UTF-8 encoding fits in maxBytes */
export function truncateUtf8(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) return text;

  let bytes = 0;
  let result = '';
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) break;
    bytes += size;
    result += char;
  }
  return result;
}
