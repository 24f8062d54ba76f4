import { ApiKeyRecord, ApiKeyStatus } from '../api-keys/types';

/** Telegram rejects messages above 4096 characters; stay below with some room. */
export const MESSAGE_LIMIT = 4000;

const LIST_SEPARATOR = '--------------';

export const USAGE_LINES = {
  genkey: '/genkey <name> <days>',
  usage: '/usage <key | name>',
  rework: '/rework <name>',
  delkey: '/delkey <key | name>',
  test: '/test <main | key | name>',
} as const;

export type AdminCommand = keyof typeof USAGE_LINES | 'list';

/**
 * Legacy Markdown has no escape inside a code span, so backticks in user
 * supplied values are replaced.
 */
export function code(value: string | number): string {
  return `\`${String(value).replace(/`/g, "'")}\``;
}

/** `YYYY-MM-DD HH:MM UTC`; unparsable input is echoed unchanged. */
export function formatUtc(iso: string): string {
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    return iso;
  }
  return `${parsed.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function startMessage(): string {
  return '*Alice AI*\n\nPrivate AI API service.\n\nUse /help to view commands.';
}

export function helpMessage(): string {
  return [
    '*Commands*',
    '',
    code(USAGE_LINES.genkey),
    code('/list'),
    code(USAGE_LINES.usage),
    code(USAGE_LINES.rework),
    code(USAGE_LINES.delkey),
    code(USAGE_LINES.test),
  ].join('\n');
}

export function usageLine(command: keyof typeof USAGE_LINES): string {
  return `*Usage:* ${code(USAGE_LINES[command])}`;
}

export function keyCreatedMessage(record: ApiKeyRecord, publicBaseUrl: string): string {
  return [
    '*API Key Generated*',
    '',
    `*Name:* ${code(record.name)}`,
    `*Key:* ${code(record.key)}`,
    `*Expires:* ${formatUtc(record.expiresAt)}`,
    '',
    code(exampleUrl(publicBaseUrl, record.key)),
  ].join('\n');
}

export function exampleUrl(publicBaseUrl: string, key: string): string {
  const base = publicBaseUrl.replace(/\/+$/, '');
  return `${base}/ai?apikey=${encodeURIComponent(key)}&prompt=Hello`;
}

export function listEntry(record: ApiKeyRecord, status: ApiKeyStatus): string {
  return [
    `*Name:* ${code(record.name)}`,
    `*Key:* ${code(record.key)}`,
    `*Usage:* ${code(record.usage)}`,
    `*Expires:* ${formatUtc(record.expiresAt)}`,
    `*Status:* ${status}`,
    LIST_SEPARATOR,
  ].join('\n');
}

export function usageMessage(record: ApiKeyRecord): string {
  return ['*Usage*', '', `*Name:* ${code(record.name)}`, `*Requests:* ${code(record.usage)}`].join(
    '\n',
  );
}

export function reworkMessage(record: ApiKeyRecord): string {
  return ['*Key Reworked*', '', `*Name:* ${code(record.name)}`, `*New Key:* ${code(record.key)}`].join(
    '\n',
  );
}

export function deletedMessage(count: number): string {
  return count === 0 ? '*Key not found*' : `*Deleted:* ${code(count)} key(s)`;
}

export function testMessage(
  latency: number,
  target?: { record: ApiKeyRecord; status: ApiKeyStatus },
): string {
  const lines = ['*OK*', `Latency: ${code(`${latency}s`)}`];
  if (target) {
    lines.push(`*Name:* ${code(target.record.name)}`, `*Status:* ${target.status}`);
  }
  return lines.join('\n');
}

/**
 * Packs entries into as few messages as possible, each at most `limit`
 * characters. An entry longer than the limit is cut into pieces.
 */
export function chunkEntries(entries: string[], limit: number = MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current.length > 0) {
      chunks.push(current);
      current = '';
    }
  };

  for (const entry of entries) {
    if (entry.length > limit) {
      flush();
      chunks.push(...splitText(entry, limit));
      continue;
    }

    const candidate = current.length === 0 ? entry : `${current}\n${entry}`;
    if (candidate.length > limit) {
      flush();
      current = entry;
    } else {
      current = candidate;
    }
  }

  flush();
  return chunks;
}

/** Cuts `text` into pieces of at most `limit` UTF-16 units without splitting a surrogate pair. */
function splitText(text: string, limit: number): string[] {
  const pieces: string[] = [];
  let offset = 0;

  while (offset < text.length) {
    let end = Math.min(offset + limit, text.length);
    if (end < text.length && end - offset > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    pieces.push(text.slice(offset, end));
    offset = end;
  }

  return pieces;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
