export const TELEGRAM_CHUNK_SIZE = 3900;

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

/**
 * Splits a reply into Telegram-sized chunks, cutting after the last newline
 * inside each window when there is one. A cut never separates a surrogate
 * pair. Joining the chunks gives back `text`.
 */
export const splitForTelegram = (text: string, maxLen = TELEGRAM_CHUNK_SIZE): string[] => {
  if (text.length <= maxLen) {
    return [text];
  }

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > maxLen) {
    const newline = rest.lastIndexOf('\n', maxLen - 1);
    let end = newline > 0 ? newline + 1 : maxLen;
    if (end > 1 && isHighSurrogate(rest.charCodeAt(end - 1))) {
      end -= 1;
    }
    chunks.push(rest.slice(0, end));
    rest = rest.slice(end);
  }
  if (rest) {
    chunks.push(rest);
  }
  return chunks;
};
