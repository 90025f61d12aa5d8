import pino from 'pino';

// Level is applied from the validated config at start-up (see index.ts).
export const log = pino({
  level: 'info',
  base: { service: 'voice-answer-bridge' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
