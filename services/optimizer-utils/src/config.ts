import 'dotenv/config';

const DEFAULT_LOG_NAME = 'optimizer-utils';

export const config = {
  log: {
    level: process.env.LOG_LEVEL || 'info',
    name: process.env.LOG_NAME || DEFAULT_LOG_NAME,
  },
  sessions: {
    // random bytes per session id; hex output is twice as long
    idBytes: clamp(parseInt(process.env.SESSION_ID_BYTES || '16', 10), 4, 64),
  },
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}
