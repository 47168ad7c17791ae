import pino from 'pino';
import { singleton } from 'tsyringe';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

@singleton()
export class Logger {
  private pino: pino.Logger;

  constructor() {
    this.pino = pino({
      level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info'),
      transport: isDev
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
    });
  }

  info(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.info(msgOrObj);
    } else {
      this.pino.info(msgOrObj, msg);
    }
  }

  error(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.error(msgOrObj);
    } else {
      this.pino.error(msgOrObj, msg);
    }
  }

  warn(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.warn(msgOrObj);
    } else {
      this.pino.warn(msgOrObj, msg);
    }
  }

  debug(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.debug(msgOrObj);
    } else {
      this.pino.debug(msgOrObj, msg);
    }
  }

  fatal(msgOrObj: string | object, msg?: string) {
    if (typeof msgOrObj === 'string') {
      this.pino.fatal(msgOrObj);
    } else {
      this.pino.fatal(msgOrObj, msg);
    }
  }
}
