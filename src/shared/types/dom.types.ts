/**
 * Browsing Context Capabilities
 *
 * The narrow surface the challenge engine needs from a browser driver.
 * The puppeteer adapters in src/scraping/browser implement these; tests implement
 * them with an in-memory DOM.
 */

export type LoadState = "domcontentloaded" | "load";

/** A single element handle */
export interface ElementRef {
  isVisible(): Promise<boolean>;
  click(): Promise<void>;
  /** Reads a live DOM property (resolved `src`, not the raw attribute) */
  getProperty(name: string): Promise<unknown>;
  /** The frame an iframe element hosts, or null for other elements */
  contentFrame(): Promise<FrameRef | null>;
}

/** Anything whose subtree may host shadow roots */
export interface ShadowScope {
  /**
   * Shadow roots attached to elements of this scope's own tree.
   * Does not descend into those roots.
   */
  shadowRoots(): Promise<ShadowRootRef[]>;
}

export interface ShadowRootRef extends ShadowScope {
  querySelector(selector: string): Promise<ElementRef | null>;
}

/** A document-level browsing context: page main frame or child frame */
export interface Queryable extends ShadowScope {
  url(): string;
  /** Standard (non shadow-piercing) selector query */
  querySelector(selector: string): Promise<ElementRef | null>;
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>;
  bodyText(): Promise<string>;
}

export interface FrameRef extends Queryable {
  isDetached(): boolean;
}

/** Creates replacement pages when the active one is gone */
export interface SessionManager {
  /**
   * Opens a fresh page. When resumeUrl is given, the page is navigated
   * there before it is returned.
   */
  newPage(resumeUrl?: string): Promise<Queryable>;
}

export type NavigationWaitUntil =
  | "load"
  | "domcontentloaded"
  | "networkidle0"
  | "networkidle2";

/** A session that can also drive its active page to a URL */
export interface NavigationSession extends SessionManager {
  goto(url: string, waitUntil: NavigationWaitUntil, timeoutMs: number): Promise<Queryable>;
}
