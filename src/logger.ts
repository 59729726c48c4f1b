import pino from 'pino';

export function createLogger(logFile: string, level: string): pino.Logger {
  return pino(
    {
      level,
    },
    pino.destination({
      dest: logFile,
      mkdir: true,
      sync: false,
    }),
  );
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
