import pino from 'pino';
import pretty from 'pino-pretty';
import { CFG } from '../config';

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(): pino.LevelWithSilent {
  if (CFG.LOG_DEBUG) return 'debug';
  return LEVELS.find(l => l === CFG.LOG_LEVEL) ?? 'warn';
}

// stderr only: stdout carries rendered prompts
const destination = process.stderr.isTTY
  ? pretty({ colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname', destination: 2, sync: true })
  : pino.destination({ dest: 2, sync: true });

export const log = pino({ level: resolveLevel(), timestamp: pino.stdTimeFunctions.isoTime }, destination);

export function componentLogger(component: string) {
  return log.child({ component });
}
