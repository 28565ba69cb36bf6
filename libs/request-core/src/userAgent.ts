import os from 'os';
import { VERSION } from './version';

export interface ClientUserAgent {
  bindings_version: string;
  lang: 'node';
  lang_version: string;
  platform: string;
  engine: string;
  publisher: 'restwell';
  uname: string;
  hostname: string;
}

export const USER_AGENT = `Restwell NodeBindings/${VERSION}`;

/**
 * Runtime fingerprint sent with every request. `uname` is read once per
 * profiler; the rest is rebuilt on each call.
 */
export class SystemProfiler {
  private readonly systemName = SystemProfiler.uname();

  static uname(): string {
    try {
      return [os.type(), os.release(), os.version(), os.arch()].join(' ');
    } catch {
      return '(uname unavailable)';
    }
  }

  userAgent(): ClientUserAgent {
    return {
      bindings_version: VERSION,
      lang: 'node',
      lang_version: process.version,
      platform: process.platform,
      engine: process.release.name,
      publisher: 'restwell',
      uname: this.systemName,
      hostname: os.hostname(),
    };
  }
}
