import pino from 'pino'
import { type Logger, type LoggerContext } from '../../application/ports/logger.js'

export interface PinoLoggerOptions {
  name: string
  level: string
  pretty: boolean
}

export function createPinoInstance(options: PinoLoggerOptions): pino.Logger {
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
  constructor(private readonly pinoInstance: pino.Logger) {}

  info(message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance.info(obj, message)
    } else {
      this.pinoInstance.info(message)
    }
  }

  error(message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance.error(obj, message)
    } else {
      this.pinoInstance.error(message)
    }
  }

  warn(message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance.warn(obj, message)
    } else {
      this.pinoInstance.warn(message)
    }
  }

  debug(message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance.debug(obj, message)
    } else {
      this.pinoInstance.debug(message)
    }
  }

  child(context: LoggerContext): Logger {
    return new PinoLogger(this.pinoInstance.child(context))
  }
}
