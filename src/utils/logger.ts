/**
 * Structured Logger Utility
 * Leveled, timestamped logging with a compact context block.
 * Every level writes to stderr; stdout is reserved for check results.
 */

import { ConformanceParameters, ConstraintViolation } from '../types/core';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

export interface LogContext {
  component?: string;
  parameterSet?: string;
  parameter?: string;
  constraint?: string;
  step?: string;
  duration?: number;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

const defaultSink: LogSink = (line) => {
  console.error(line);
};

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

export class Logger {
  private static instance: Logger | undefined;
  private minLevel: LogLevel = LogLevel.INFO;
  private enableTimestamps: boolean = true;
  private sink: LogSink = defaultSink;

  private constructor() {
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.minLevel = envLevel;
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  setTimestamps(enabled: boolean): void {
    this.enableTimestamps = enabled;
  }

  /**
   * Redirect output; pass undefined to restore stderr
   */
  setSink(sink?: LogSink): void {
    this.sink = sink ?? defaultSink;
  }

  private getLevelPriority(level: LogLevel): number {
    const priorities: Record<LogLevel, number> = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 1,
      [LogLevel.WARN]: 2,
      [LogLevel.ERROR]: 3
    };
    return priorities[level];
  }

  private shouldLog(level: LogLevel): boolean {
    return this.getLevelPriority(level) >= this.getLevelPriority(this.minLevel);
  }

  private formatContext(ctx: LogContext): string {
    const parts: string[] = [];

    if (ctx.component) {parts.push(`comp=${ctx.component}`);}
    if (ctx.parameterSet) {parts.push(`set=${ctx.parameterSet}`);}
    if (ctx.parameter) {parts.push(`param=${ctx.parameter}`);}
    if (ctx.constraint) {parts.push(`constraint=${ctx.constraint}`);}
    if (ctx.step) {parts.push(`step=${ctx.step}`);}
    if (ctx.duration !== undefined) {parts.push(`duration=${ctx.duration}ms`);}

    return parts.length > 0 ? `[${parts.join(' | ')}]` : '';
  }

  private formatMessage(level: LogLevel, message: string, ctx?: LogContext, data?: unknown): string {
    const parts: string[] = [];

    if (this.enableTimestamps) {
      parts.push(new Date().toISOString());
    }

    parts.push(`[${level}]`);

    if (ctx) {
      const contextStr = this.formatContext(ctx);
      if (contextStr) {parts.push(contextStr);}
    }

    parts.push(message);

    if (data !== undefined) {
      if (typeof data === 'string') {
        const maxLen = 500;
        parts.push(data.length > maxLen ? data.substring(0, maxLen) + '...' : data);
      } else {
        parts.push(JSON.stringify(data));
      }
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, ctx, data));
    }
  }

  debug(message: string, ctx?: LogContext, data?: unknown): void {
    this.write(LogLevel.DEBUG, message, ctx, data);
  }

  info(message: string, ctx?: LogContext, data?: unknown): void {
    this.write(LogLevel.INFO, message, ctx, data);
  }

  warn(message: string, ctx?: LogContext, data?: unknown): void {
    this.write(LogLevel.WARN, message, ctx, data);
  }

  error(message: string, ctx?: LogContext, data?: unknown): void {
    this.write(LogLevel.ERROR, message, ctx, data);
  }

  // Convenience methods for the check lifecycle
  checkStart(parameters: ConformanceParameters, parameterSet?: string): void {
    this.debug(
      `Checking bound=${parameters.bound} flag=${parameters.flag} powerValue=${parameters.powerValue}`,
      { component: 'Check', parameterSet, step: 'untested' }
    );
  }

  gatePassed(parameter: string, condition: string, parameterSet?: string): void {
    this.debug(`  ├─ ✓ ${condition}`, { component: 'Check', parameterSet, parameter });
  }

  violation(violation: ConstraintViolation, parameterSet?: string): void {
    this.error(`Constraint violated: ${violation.condition} (${violation.parameter}=${violation.value})`, {
      component: 'Check',
      parameterSet,
      parameter: violation.parameter,
      constraint: violation.constraint,
      step: 'aborted-on-violation'
    });
  }

  checkComplete(result: number, duration: number, parameterSet?: string): void {
    this.debug(`  └─ Result ${result}`, {
      component: 'Check',
      parameterSet,
      step: 'completed-with-output',
      duration
    });
  }
}

export const logger = Logger.getInstance();
