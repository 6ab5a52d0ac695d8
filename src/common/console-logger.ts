/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { levelEnabled } from './logger';
import type { Logger, LogLevel } from './logger';
import { loadConfig } from './config';

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private readonly level: LogLevel;

  /**
   * @param level minimum level written to the console; defaults to the configured level
   */
  constructor(level: LogLevel = loadConfig().logLevel) {
    this.context = undefined;
    this.level = level;
  }

  clone(): ConsoleLogger {
    const copy = new ConsoleLogger(this.level);
    copy.setContext(this.context);
    return copy;
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  trace(message: string, ...attributes: unknown[]): void {
    if (!levelEnabled('trace', this.level)) return;
    if (this.context) console.trace(this.context, message, ...attributes);
    else console.trace(message, ...attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (!levelEnabled('debug', this.level)) return;
    if (this.context) console.debug(this.context, message, ...attributes);
    else console.debug(message, ...attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (!levelEnabled('info', this.level)) return;
    if (this.context) console.info(this.context, message, ...attributes);
    else console.info(message, ...attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (!levelEnabled('warn', this.level)) return;
    if (this.context) console.warn(this.context, message, ...attributes);
    else console.warn(message, ...attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (!levelEnabled('error', this.level)) return;
    if (this.context) console.error(this.context, message, ...attributes);
    else console.error(message, ...attributes);
  }
}
