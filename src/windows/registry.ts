/**
 * One session, at most one window.
 * Windows are opaque handles compared by identity. All methods are synchronous, so each runs to
 * completion on the event loop before the next claim is observed.
 */

import type { Logger } from "../logging";
import { componentLogger } from "../logging";
import { incrementCounter } from "../metrics";

export type ClaimResult<W> = { status: "claimed" } | { status: "redirected"; window: W };

export type DetachedListener = (detached: ReadonlySet<string>) => void;

export interface WindowSessionRegistryConfig<W> {
  /** When no main window is designated, the first window to claim becomes main. Default true. */
  adoptFirstWindowAsMain?: boolean;
  /** Presentation hook: bring `window` forward because it already shows `sessionId`. */
  onRedirect?: (window: W, sessionId: string) => void;
  logger?: Logger;
}

export class WindowSessionRegistry<W> {
  private readonly claims = new Map<string, { window: W }>();
  private main: W | null = null;
  private detached: ReadonlySet<string> = new Set();
  private listeners: DetachedListener[] = [];
  private readonly adoptFirstWindowAsMain: boolean;
  private readonly onRedirect?: (window: W, sessionId: string) => void;
  private readonly log: Logger;

  constructor(config: WindowSessionRegistryConfig<W> = {}) {
    this.adoptFirstWindowAsMain = config.adoptFirstWindowAsMain ?? true;
    this.onRedirect = config.onRedirect;
    this.log = config.logger ?? componentLogger("window-registry");
  }

  /**
   * Claim `sessionId` for `window`. A claim held by another window is never transferred: the
   * caller gets that window back and should show it instead.
   */
  claim(sessionId: string, window: W): ClaimResult<W> {
    const claim = this.claims.get(sessionId);
    if (claim && claim.window !== window) {
      incrementCounter("claimsRedirected");
      this.log.info({ event: "WINDOW_CLAIM_REDIRECTED", sessionId }, "Session already open in another window");
      this.onRedirect?.(claim.window, sessionId);
      return { status: "redirected", window: claim.window };
    }
    if (this.main === null && this.adoptFirstWindowAsMain) {
      this.main = window;
      this.log.debug({ event: "WINDOW_MAIN_ADOPTED", sessionId }, "First claiming window became main");
    }
    this.claims.set(sessionId, { window });
    if (!claim) {
      incrementCounter("claimsGranted");
      this.log.debug({ event: "WINDOW_CLAIMED", sessionId }, "Session claimed");
    }
    this.refreshDetached();
    return { status: "claimed" };
  }

  /** Drop the claim on `sessionId`, whoever holds it. */
  release(sessionId: string): void {
    if (!this.claims.delete(sessionId)) return;
    this.log.debug({ event: "WINDOW_RELEASED", sessionId }, "Session released");
    this.refreshDetached();
  }

  /** Drop every claim held by `window` (window closed). Clears the main designation if it was main. */
  releaseAll(window: W): void {
    let released = 0;
    for (const [sessionId, claim] of [...this.claims]) {
      if (claim.window === window) {
        this.claims.delete(sessionId);
        released += 1;
      }
    }
    if (this.main === window) this.main = null;
    this.log.debug({ event: "WINDOW_CLOSED", released }, "Window claims released");
    this.refreshDetached();
  }

  setMainWindow(window: W): void {
    if (this.main === window) return;
    this.main = window;
    this.refreshDetached();
  }

  mainWindow(): W | null {
    return this.main;
  }

  windowFor(sessionId: string): W | undefined {
    return this.claims.get(sessionId)?.window;
  }

  isClaimed(sessionId: string): boolean {
    return this.claims.has(sessionId);
  }

  /** Claimed by a window other than main. UI indicator only. */
  isDetached(sessionId: string): boolean {
    return this.detached.has(sessionId);
  }

  claimedSessions(): string[] {
    return [...this.claims.keys()];
  }

  detachedSessions(): ReadonlySet<string> {
    return this.detached;
  }

  /** Notified with the new detached set whenever it changes. */
  subscribeDetached(listener: DetachedListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private refreshDetached(): void {
    const next = new Set<string>();
    for (const [sessionId, claim] of this.claims) {
      if (claim.window !== this.main) next.add(sessionId);
    }
    if (sameMembers(next, this.detached)) return;
    this.detached = next;
    this.listeners.forEach((l) => l(next));
  }
}

function sameMembers(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}
