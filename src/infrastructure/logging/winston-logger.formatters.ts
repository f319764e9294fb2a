import * as winston from 'winston';
import { RequestContextService } from './request-context.service';
import { redactRecord } from './utils/redaction.util';

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  http: '🌐',
  verbose: '🔍',
  debug: '🐞',
  silly: '✨',
};

// keys rendered elsewhere in the console line, or only meant for files
const CONSOLE_OMIT = new Set([
  'timestamp',
  'level',
  'message',
  'context',
  'trace',
  'requestId',
  'correlationId',
  'userId',
  'serviceName',
  'source',
  'sourceAbs',
  'file',
  'line',
  'column',
  'function',
  'icon',
]);

const REQUEST_KEYS = [
  'requestId',
  'correlationId',
  'userId',
  'serviceName',
  'method',
  'path',
] as const;

function humanizeValueInline(value: unknown): string {
  if (value == null) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return humanizeObjectInline(Object.entries(value));
  return String(value);
}

function humanizeObjectInline(entries: Array<[string, unknown]>): string {
  return entries.map(([k, v]) => `${k}=${humanizeValueInline(v)}`).join(' ');
}

const redactFormat = winston.format((info) => {
  const redacted = redactRecord({ ...info });
  for (const [key, value] of Object.entries(redacted)) {
    if (key !== 'message' && key !== 'level') info[key] = value;
  }
  return info;
});

// runs before colorize, which wraps the level in escape codes
const iconFormat = winston.format((info) => {
  info.icon = levelIcon[info.level] || '•';
  return info;
});

export function makeAttachRequestContextFormat(ctx?: RequestContextService) {
  return winston.format((info) => {
    const store = ctx?.getStore();
    if (!store) return info;
    for (const key of REQUEST_KEYS) {
      const value = store[key];
      if (value && !info[key]) info[key] = value;
    }
    return info;
  });
}

export function makePrettyConsoleFormat(ctx?: RequestContextService) {
  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    iconFormat(),
    winston.format.colorize({ all: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf((info) => {
      const requestPart = info.requestId ? ` [req:${String(info.requestId)}]` : '';
      const sourcePart = typeof info.source === 'string' ? ` (${info.source})` : '';

      let contextLabel = '';
      let detailsPart = '';
      const context = info.context;
      if (typeof context === 'string' && context.startsWith('{') && context.endsWith('}')) {
        try {
          const parsed: unknown = JSON.parse(context);
          detailsPart = ` ${humanizeValueInline(parsed)}`;
        } catch {
          detailsPart = ` ${context}`;
        }
      } else if (context) {
        contextLabel = ` [${String(context)}]`;
      }

      const extra = Object.entries(info).filter(([key]) => !CONSOLE_OMIT.has(key));
      const restPart = extra.length ? ` ${humanizeObjectInline(extra)}` : '';
      const tracePart = typeof info.trace === 'string' ? `\n${info.trace}` : '';
      const icon = typeof info.icon === 'string' ? info.icon : '•';
      const body = `${String(info.message)}${detailsPart}${restPart}`.trim();
      const line = `${String(info.timestamp)} ${icon} ${info.level.toUpperCase().padEnd(7)}${requestPart}${contextLabel}${sourcePart}: ${body}`;
      return `${line}${tracePart}`.trimEnd();
    })
  );
}

export function makeJsonFileFormat(ctx?: RequestContextService) {
  const pruneFileMetaFormat = winston.format((info) => {
    delete info.source;
    delete info.file;
    delete info.line;
    delete info.column;
    delete info.function;
    return info;
  });

  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    pruneFileMetaFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );
}
