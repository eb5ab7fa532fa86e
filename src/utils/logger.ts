import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

LogEngine.configure({
  mode: LogMode.INFO,
  format: {
    includeIsoTimestamp: false,
    includeLocalTime: true,
    includeEmoji: true,
  },
});

export function success(msg: string) {
  LogEngine.log(msg);
}

export function error(msg: string) {
  LogEngine.error(msg);
}

export function info(msg: string) {
  LogEngine.info(msg);
}
