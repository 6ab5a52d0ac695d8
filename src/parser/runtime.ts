/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { DOMImplementation } from '@xmldom/xmldom';
import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import type { DomDocument, DomImplementation } from './types';

/*
 * Process-wide engine state. Created on first use, pinned by init() and torn
 * down once it is unpinned and the last live document is released. Node runs
 * each isolate single-threaded, so no lock guards the setup; workers get a
 * state of their own.
 */

interface EngineState {
  implementation: DomImplementation;
  logger: Logger;
  pinned: boolean;
  liveDocuments: number;
}

export interface InitOptions {
  /** Receives parser diagnostics and debug traces. */
  logger?: Logger;
}

/** What a document gets from the runtime when it is created. */
export interface EngineLease {
  document: DomDocument;
  logger: Logger;
}

let state: EngineState | undefined;

function defaultLogger(): Logger {
  const logger = new ConsoleLogger();
  logger.setContext('[markup-query]');
  return logger;
}

function ensureEngine(): EngineState {
  if (!state) {
    state = {
      implementation: new DOMImplementation(),
      logger: defaultLogger(),
      pinned: false,
      liveDocuments: 0,
    };
    state.logger.debug('engine initialized');
  }
  return state;
}

function teardownIfUnused(): void {
  if (state && !state.pinned && state.liveDocuments === 0) {
    state.logger.debug('engine released');
    state = undefined;
  }
}

/** Pin the engine, optionally installing the diagnostic logger. */
export function init(options: InitOptions = {}): void {
  const engine = ensureEngine();
  if (options.logger) engine.logger = options.logger;
  engine.pinned = true;
}

/** Unpin the engine. It goes away when no document is alive any more. */
export function cleanup(): void {
  if (!state) return;
  state.pinned = false;
  teardownIfUnused();
}

export function isInitialized(): boolean {
  return state !== undefined;
}

/** Number of documents currently holding the engine. */
export function liveDocumentCount(): number {
  return state?.liveDocuments ?? 0;
}

/** Hand out an empty DOM document and count it as live until release(). */
export function acquire(): EngineLease {
  const engine = ensureEngine();
  engine.liveDocuments++;
  return {
    document: engine.implementation.createDocument(null, null, null),
    logger: engine.logger,
  };
}

export function release(): void {
  if (!state || state.liveDocuments === 0) return;
  state.liveDocuments--;
  teardownIfUnused();
}

/** A document's hold on the engine, given back once by dispose() or by the GC. */
export interface DocumentHold {
  released: boolean;
  logger: Logger;
}

const abandoned = new FinalizationRegistry<DocumentHold>((hold) => {
  hold.logger.debug('document collected without dispose()');
  releaseHold(hold);
});

/** Release the engine when `owner` is garbage collected before releaseHold() is called. */
export function trackHold(owner: object, logger: Logger): DocumentHold {
  const hold: DocumentHold = { released: false, logger };
  abandoned.register(owner, hold, hold);
  return hold;
}

export function releaseHold(hold: DocumentHold): void {
  if (hold.released) return;
  hold.released = true;
  abandoned.unregister(hold);
  release();
}
