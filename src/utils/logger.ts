import chalk from 'chalk';
import dayjs from 'dayjs';
import { isTestEnv } from '../util/env.js';

export type LogCtx = {
  guild?: { id?: string | null; name?: string };
  channel?: { id?: string | null; name?: string };
  user?: { id?: string; tag?: string };
  command?: string;
  ok?: boolean;
  ms?: number;
};

const ts = () => dayjs().format('YYYY-MM-DD HH:mm:ss');

function where(ctx?: LogCtx) {
  const g = ctx?.guild?.name ?? ctx?.guild?.id ?? '–';
  const c = ctx?.channel?.name ?? ctx?.channel?.id ?? '–';
  const u = ctx?.user?.tag ?? ctx?.user?.id ?? '–';
  return `${chalk.gray('@')}${chalk.cyan(u)} ${chalk.gray('in')} ${chalk.magenta(g)}${chalk.gray('#')}${chalk.magenta(c)}`;
}

function extraText(extra: unknown): string {
  try { return JSON.stringify(extra); } catch { return String(extra); }
}

export function logInfo(msg: string, ctx?: LogCtx, extra?: unknown) {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  const head = `${chalk.gray(ts())} ${chalk.green('●')} ${chalk.bold.green(msg)}`;
  const tail = ctx ? ` ${chalk.dim('[')}${where(ctx)}${chalk.dim(']')}` : '';
  console.log(head + tail);
  if (extra !== undefined) console.log(chalk.dim(extraText(extra)));
}

export function logWarn(msg: string, ctx?: LogCtx, extra?: unknown) {
  if (isTestEnv()) return;
  const head = `${chalk.gray(ts())} ${chalk.yellow('▲')} ${chalk.bold.yellow(msg)}`;
  const tail = ctx ? ` ${chalk.dim('[')}${where(ctx)}${chalk.dim(']')}` : '';
  console.warn(head + tail);
  if (extra !== undefined) console.warn(chalk.yellow(extraText(extra)));
}

export function logCmdStart(ctx: LogCtx) {
  logInfo(`/${ctx.command ?? 'command'} invoked`, ctx);
}

export function logCmdEnd(ctx: LogCtx) {
  const name = ctx.command ?? 'command';
  const ms = typeof ctx.ms === 'number' ? ` ${chalk.dim(`(${ctx.ms}ms)`)}` : '';
  if (ctx.ok) logInfo(`/${name} finished ✅`, ctx, { durationMs: ctx.ms });
  else logWarn(`/${name} failed${ms}`, ctx);
}

export function logBlocked(msg: string, ctx: LogCtx) {
  logWarn(`/${ctx.command ?? 'command'} blocked: ${msg}`, ctx);
}
