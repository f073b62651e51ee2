const whitespacePattern = /\s+/g;
const base64Pattern =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=|[A-Za-z0-9+/]{2,3})?$/;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export type DecodedText = Readonly<{
  readonly text: string;
  readonly charset: 'utf-8' | 'latin1';
}>;

const stripWhitespace = (value: string): string =>
  value.replace(whitespacePattern, '');

/**
 * Decode a base64 payload from the contents API (wrapped at 60 columns).
 * Bytes that are not valid UTF-8 are read as latin1 instead.
 */
export const decodeBase64Text = (content: string): DecodedText => {
  const normalized = stripWhitespace(content);
  if (!base64Pattern.test(normalized)) {
    throw new Error('Content is not valid base64');
  }
  const bytes = Buffer.from(normalized, 'base64');
  try {
    return { text: strictUtf8.decode(bytes), charset: 'utf-8' };
  } catch {
    return { text: bytes.toString('latin1'), charset: 'latin1' };
  }
};

export const truncateText = (
  text: string,
  maxChars: number,
): Readonly<{ text: string; truncated: boolean }> =>
  text.length > maxChars
    ? { text: text.slice(0, maxChars), truncated: true }
    : { text, truncated: false };
