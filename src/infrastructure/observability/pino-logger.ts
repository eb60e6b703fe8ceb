import { pino, type Logger as PinoInstance } from 'pino'
import type { Logger, LoggerContext } from '../../application/ports/logger.js'

export interface PinoLoggerOptions {
  name: string
  level: string
  pretty: boolean
}

type WriteLevel = 'info' | 'error' | 'warn' | 'debug'

export function createPinoInstance(options: PinoLoggerOptions): PinoInstance {
  return pino({
    name: options.name,
    level: options.level,
    transport: options.pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname'
      }
    } : undefined
  })
}

export class PinoLogger implements Logger {
  constructor(private readonly pinoInstance: PinoInstance) {}

  info(message: string, obj?: object): void {
    this.write('info', message, obj)
  }

  error(message: string, obj?: object): void {
    this.write('error', message, obj)
  }

  warn(message: string, obj?: object): void {
    this.write('warn', message, obj)
  }

  debug(message: string, obj?: object): void {
    this.write('debug', message, obj)
  }

  child(context: LoggerContext): Logger {
    return new PinoLogger(this.pinoInstance.child(context))
  }

  private write(level: WriteLevel, message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance[level](obj, message)
    } else {
      this.pinoInstance[level](message)
    }
  }
}
