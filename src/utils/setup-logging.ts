const WRAP_FLAG = Symbol.for('oiScannerConsoleTimestampWrapped');

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';

/**
 * Build a formatter producing `YYYY-MM-DD HH:MM:SS` in the given time zone
 */
export function createTimestampFormatter(timeZone: string): (date: Date) => string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });

  return (date: Date): string => {
    const parts: Record<string, string> = {};
    for (const part of formatter.formatToParts(date)) {
      parts[part.type] = part.value;
    }
    return `${parts['year']}-${parts['month']}-${parts['day']} ${parts['hour']}:${parts['minute']}:${parts['second']}`;
  };
}

export function installConsoleTimestamps(timeZone: string): void {
  // Avoid wrapping multiple times if module is imported more than once.
  if (Reflect.get(console, WRAP_FLAG) === true) {
    return;
  }

  const format = createTimestampFormatter(timeZone);

  const wrapMethod = (method: ConsoleMethod) => {
    const original = console[method].bind(console);

    console[method] = (...args: unknown[]): void => {
      const timestamp = format(new Date());

      if (args.length === 0) {
        original(`[${timestamp}]`);
        return;
      }

      const [first, ...rest] = args;

      if (typeof first === 'string') {
        original(`[${timestamp}] ${first}`, ...rest);
      } else {
        original(`[${timestamp}]`, first, ...rest);
      }
    };
  };

  wrapMethod('log');
  wrapMethod('info');
  wrapMethod('warn');
  wrapMethod('error');
  wrapMethod('debug');

  Reflect.set(console, WRAP_FLAG, true);
}
