// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Destination for formatted log lines. The default writes to the console;
 * tests pass their own to capture output.
 */
export interface LogSink {
   write(level: Exclude<LogLevel, 'silent'>, text: string, rest: unknown[]): void;
}

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[pdf-assemble]" or "[resolve]").
    */
   prefix?: string;
   sink?: LogSink;
   /**
    * Force ANSI colors on or off. Defaults to on for a TTY without NO_COLOR.
    */
   color?: boolean;
}

/**
 * Minimal ANSI color helpers (no external deps).
 */
const supportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout && process.stdout.isTTY) &&
   process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number, enabled: boolean): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (enabled ? `${open}${text}${close}` : text);
}

function palette(enabled: boolean) {
   return {
      red: wrap(31, enabled),
      yellow: wrap(33, enabled),
      cyan: wrap(36, enabled),
      magenta: wrap(35, enabled),
      dim: wrap(2, enabled),
      gray: wrap(90, enabled),
   };
}

type Palette = ReturnType<typeof palette>;

function colorForLevel(level: LogLevel, color: Palette): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.gray;
      default:
         return (s) => s;
   }
}

export const consoleSink: LogSink = {
   write(level, text, rest) {
      switch (level) {
         case 'error':
            console.error(text, ...rest);
            break;
         case 'warn':
            console.warn(text, ...rest);
            break;
         case 'info':
            console.log(text, ...rest);
            break;
         case 'debug':
            console.debug(text, ...rest);
            break;
      }
   },
};

export function isLogLevel(value: unknown): value is LogLevel {
   return LEVEL_ORDER.some((level) => level === value);
}

/**
 * Leveled logger with colored output. Components receive one explicitly and
 * derive prefixed children from it.
 */
export class Logger {
   private level: LogLevel;
   private readonly prefix: string | undefined;
   private readonly sink: LogSink;
   private readonly useColor: boolean;
   private readonly color: Palette;

   constructor(options: LoggerOptions = {}) {
      this.level = options.level ?? 'info';
      this.prefix = options.prefix;
      this.sink = options.sink ?? consoleSink;
      this.useColor = options.color ?? supportsColor;
      this.color = palette(this.useColor);
   }

   setLevel(level: LogLevel) {
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.level;
   }

   /**
    * Create a child logger with an additional prefix.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({
         level: this.level,
         prefix: combined,
         sink: this.sink,
         color: this.useColor,
      });
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const levelColor = colorForLevel(lvl, this.color);
      const prefixColored = this.prefix
         ? this.color.magenta(this.prefix)
         : undefined;

      const textColored =
         lvl === 'debug' ? this.color.dim(text) : levelColor(text);

      if (prefixColored) {
         return `${prefixColored} ${textColored}`;
      }

      return textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.level === 'silent') return false;
      const currentIdx = LEVEL_ORDER.indexOf(this.level);
      const targetIdx = LEVEL_ORDER.indexOf(targetLevel);
      return targetIdx <= currentIdx || targetLevel === 'error';
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      this.sink.write('error', this.formatMessage(msg, 'error'), rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.sink.write('warn', this.formatMessage(msg, 'warn'), rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.sink.write('info', this.formatMessage(msg, 'info'), rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.sink.write('debug', this.formatMessage(msg, 'debug'), rest);
   }
}

/**
 * Logger that drops everything; the fallback when a caller injects none.
 */
export function silentLogger(): Logger {
   return new Logger({ level: 'silent' });
}
