import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import { getRequestContext } from './request-context';

// Adds correlation ID and acting user to every log
export const requestContextFormat = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.correlationId = context.correlationId;
    if (context.username) {
      info.username = context.username;
    }
  }
  return info;
});

@Global()
@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const nodeEnv = configService.get<string>('NODE_ENV');
        const isProduction = nodeEnv === 'production';

        return {
          level: isProduction ? 'info' : 'debug',
          silent: nodeEnv === 'test',
          format: winston.format.combine(
            winston.format.timestamp(),
            requestContextFormat(),
            isProduction
              ? winston.format.json()
              : winston.format.combine(
                  winston.format.colorize(),
                  winston.format.printf(
                    ({ level, message, timestamp, correlationId, username, context, ...meta }) => {
                      const corrId = correlationId ? `[${String(correlationId).substring(0, 8)}]` : '';
                      const actor = username ? `[${String(username)}]` : '';
                      const ctx = context ? `[${String(context)}]` : '';
                      const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
                      return `${String(timestamp)} ${level} ${corrId}${actor}${ctx} ${String(message)} ${metaStr}`;
                    },
                  ),
                ),
          ),
          transports: [
            new winston.transports.Console(),
            ...(isProduction
              ? [
                  new winston.transports.File({
                    filename: 'logs/error.log',
                    level: 'error',
                  }),
                  new winston.transports.File({
                    filename: 'logs/combined.log',
                  }),
                ]
              : []),
          ],
        };
      },
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
