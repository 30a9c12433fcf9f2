let debugEnabled =
  process.env.DOCSHIFT_DEBUG === "1" || process.env.DOCSHIFT_DEBUG === "true";
let silent = false;

function stamp(): string {
  return new Date().toISOString();
}

export function setDebug(enabled: boolean) {
  debugEnabled = enabled;
}

export function isDebug(): boolean {
  return debugEnabled;
}

/** Used by tests to keep runner output clean. */
export function setSilent(value: boolean) {
  silent = value;
}

export const log = {
  info(tag: string, message: string) {
    if (!silent) console.log(`${stamp()} [${tag}] ${message}`);
  },
  warn(tag: string, message: string) {
    if (!silent) console.warn(`${stamp()} [${tag}] ${message}`);
  },
  error(tag: string, message: string, err?: unknown) {
    if (silent) return;
    if (err === undefined) {
      console.error(`${stamp()} [${tag}] ${message}`);
    } else {
      console.error(`${stamp()} [${tag}] ${message}`, err);
    }
  },
  debug(tag: string, message: string) {
    if (debugEnabled && !silent) console.log(`${stamp()} [${tag}] ${message}`);
  },
};
