// src/contracts/ask-args.ts
import path from 'path';

export const ASK_USAGE =
  'Usage: ask.cli --file=<contract.txt> --question="..." [--topK=5] [--documentId=...] [--format=json|markdown]';

export interface AskArgs {
  file: string;
  question: string;
  documentId: string;
  topK?: number;
  format: 'json' | 'markdown';
}

export type ParsedAskArgs = { ok: true; args: AskArgs } | { ok: false; error: string };

export function getArg(argv: readonly string[], name: string): string | undefined {
  const key = `--${name}=`;
  const hit = argv.find((a) => a.startsWith(key));
  return hit ? hit.slice(key.length) : undefined;
}

function documentIdFor(file: string): string {
  return path.basename(file, path.extname(file)).replace(/[^A-Za-z0-9._-]+/g, '_') || 'contract';
}

/** Checks the command line before anything boots; every failure here is a usage error. */
export function parseAskArgs(argv: readonly string[]): ParsedAskArgs {
  const file = getArg(argv, 'file');
  const question = getArg(argv, 'question');
  if (!file || !question?.trim()) {
    return { ok: false, error: ASK_USAGE };
  }

  const rawTopK = getArg(argv, 'topK');
  const topK = rawTopK === undefined ? undefined : Number(rawTopK);
  if (topK !== undefined && (!Number.isInteger(topK) || topK < 1)) {
    return { ok: false, error: `--topK must be a positive integer, got "${rawTopK}"` };
  }

  const format = getArg(argv, 'format') ?? 'json';
  if (format !== 'json' && format !== 'markdown') {
    return { ok: false, error: `--format must be json or markdown, got "${format}"` };
  }

  return {
    ok: true,
    args: {
      file,
      question,
      documentId: getArg(argv, 'documentId') ?? documentIdFor(file),
      topK,
      format,
    },
  };
}
