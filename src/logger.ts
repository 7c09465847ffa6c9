export class Logger {
  private static _verbose = false;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  static info(...args: unknown[]) {
    console.log(...args);
  }

  static warn(...args: unknown[]) { console.warn(...args); }
  static error(...args: unknown[]) { console.error(...args); }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND BARSYNC_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.BARSYNC_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (Logger._verbose && debugLevel) console.error(...args);
  }
}
