import * as path from 'path';

export interface CallSite {
  source?: string;
  sourceAbs?: string;
  file?: string;
  line?: number;
  column?: number;
  function?: string;
}

const FRAME = /^at\s+(?:(.+?)\s+\()?(.*?):(\d+):(\d+)\)?$/;

const LOGGER_FILE_HINTS = [
  `${path.sep}logger`,
  `${path.sep}winston-logger`,
  `${path.sep}logging${path.sep}`,
];

function normalize(p: string): string {
  return p.replace(/\\/g, '/');
}

function isInternal(p: string): boolean {
  return (
    !p ||
    p.includes(`${path.sep}node_modules${path.sep}`) ||
    p.startsWith('node:') ||
    LOGGER_FILE_HINTS.some((h) => p.includes(h))
  );
}

function isMain(p: string): boolean {
  return /\/(src|dist)\/main\.(t|j)s$/i.test(normalize(p));
}

function matchesHint(p: string, fn: string | undefined, hint: string | undefined): boolean {
  if (!hint) return false;
  const h = hint.toLowerCase();
  const base = h.replace(/(usecase|service|controller|module|adapter|repository)$/i, '');
  const n = p.toLowerCase();
  const fnn = (fn || '').toLowerCase();
  return n.includes(h) || n.includes(base) || fnn.includes(h) || fnn.includes(base);
}

/**
 * Finds the first stack frame outside the logger itself. A frame whose file
 * or function matches `hint` (usually the class name passed as log context)
 * wins over the first frame under src/.
 */
export function computeCallSite(skipUntil?: Function, hint?: string): CallSite {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, skipUntil);
  const lines = (holder.stack || '').split('\n').slice(1);
  const cwd = process.cwd();

  let preferred: CallSite | undefined;
  let fallback: CallSite | undefined;

  for (const raw of lines) {
    const match = FRAME.exec(raw.trim());
    if (!match) continue;
    const [, functionName, absPath, lineText, columnText] = match;
    if (isInternal(absPath)) continue;

    const line = Number(lineText);
    const column = Number(columnText);
    const relPath = normalize(path.relative(cwd, absPath));
    const frame: CallSite = {
      source: `${relPath}:${line}:${column}`,
      sourceAbs: `${absPath}:${line}:${column}`,
      file: relPath,
      line,
      column,
      function: functionName,
    };

    if (!isMain(absPath) && matchesHint(absPath, functionName, hint)) return frame;
    if (!preferred && !isMain(absPath) && normalize(absPath).includes('/src/')) preferred = frame;
    if (!fallback) fallback = frame;
  }

  return preferred || fallback || {};
}
