import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  transport:
    process.stdout.isTTY && level !== 'silent'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

/** Cut user text for log lines. */
export function preview(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
