import pino from 'pino';
import { config } from '../config/index.js';

// stderr keeps stdout free for extracted text and JSON output
export const logger = pino(
  {
    name: 'pdf-vision-extract',
    level: config.server.logLevel,
    transport:
      config.server.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
              destination: 2,
            },
          }
        : undefined,
  },
  config.server.nodeEnv === 'development' ? undefined : pino.destination(2)
);
