import type { Env } from '../config/env';
import type { BatchRequestInput } from '../config/request';

export function parseArg(argv: readonly string[], flag: string): string | null {
  const arg = argv.find((a) => a.startsWith(`--${flag}=`));
  if (!arg) return null;
  const value = arg.split('=').slice(1).join('=');
  return value || null;
}

/**
 * Assemble the run request from flags, falling back to the environment.
 * The result still goes through BatchRequestSchema.
 */
export function requestFromArgs(argv: readonly string[], env: Env): BatchRequestInput {
  const delay = parseArg(argv, 'delay');

  return {
    url: parseArg(argv, 'url') ?? env.DAYLOG_URL,
    accountId: parseArg(argv, 'account') ?? env.DAYLOG_ACCOUNT_ID ?? '',
    secret: env.DAYLOG_SECRET ?? '',
    category: parseArg(argv, 'category') ?? '',
    start: parseArg(argv, 'start') ?? '',
    end: parseArg(argv, 'end') ?? parseArg(argv, 'start') ?? '',
    content: parseArg(argv, 'content') ?? '',
    delaySeconds: delay === null ? env.DAYLOG_DELAY_SECONDS : Number(delay),
  };
}
