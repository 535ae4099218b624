/**
 * Puppeteer Adapters
 *
 * Implements the engine's browsing context capabilities on puppeteer-core
 * handles, and translates driver errors into the engine's error classes so
 * the resolver never matches on puppeteer message strings itself.
 *
 * Shadow roots are listed with one evaluateHandle per scope; the engine
 * recurses into each root it gets back.
 */
import { ElementHandle, Frame, JSHandle, Page, TimeoutError } from "puppeteer-core";
import config from "../../config";
import {
  ChallengeError,
  DetectionTransientError,
  ElementInteractionError,
  errorMessage,
  LoadTimeoutError,
  TargetCrashedError,
} from "../../shared/errors/challenge.errors";
import {
  ElementRef,
  FrameRef,
  LoadState,
  ShadowRootRef,
} from "../../shared/types/dom.types";

const CONTEXT_DESTROYED_PATTERN = /Execution context was destroyed/i;
const TARGET_CLOSED_PATTERN =
  /Target closed|Session closed|Target crashed|Page crashed|Connection closed|Browser has disconnected/i;

/**
 * Map a puppeteer error onto the engine's taxonomy.
 * Errors with no engine meaning come back unchanged.
 */
export function translateBrowserError(error: unknown): Error {
  if (error instanceof ChallengeError) return error;

  const message = errorMessage(error);
  if (CONTEXT_DESTROYED_PATTERN.test(message)) {
    return new DetectionTransientError(message);
  }
  if (TARGET_CLOSED_PATTERN.test(message)) {
    return new TargetCrashedError(message);
  }
  return error instanceof Error ? error : new Error(message);
}

async function guarded<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateBrowserError(error);
  }
}

/** Wrap the element handles of an in-page array as shadow roots */
async function toShadowRoots(
  handle: JSHandle<ShadowRoot[]>,
  shadowRootProperty: string
): Promise<ShadowRootRef[]> {
  const roots: ShadowRootRef[] = [];
  const properties = await handle.getProperties();

  for (const property of properties.values()) {
    const element = property.asElement();
    if (element) {
      roots.push(new PuppeteerShadowRoot(element, shadowRootProperty));
    } else {
      await property.dispose();
    }
  }

  await handle.dispose();
  return roots;
}

export class PuppeteerElement implements ElementRef {
  constructor(
    private readonly handle: ElementHandle<Element>,
    private readonly shadowRootProperty: string
  ) {}

  isVisible(): Promise<boolean> {
    return guarded(() => this.handle.isVisible());
  }

  async click(): Promise<void> {
    try {
      await this.handle.click();
    } catch (error) {
      const translated = translateBrowserError(error);
      throw translated instanceof ChallengeError
        ? translated
        : new ElementInteractionError(translated.message);
    }
  }

  getProperty(name: string): Promise<unknown> {
    return guarded(async () => {
      const property = await this.handle.getProperty(name);
      try {
        return await property.jsonValue();
      } finally {
        await property.dispose();
      }
    });
  }

  contentFrame(): Promise<FrameRef | null> {
    return guarded(async () => {
      const frame = await this.handle.contentFrame();
      return frame ? new PuppeteerFrame(frame, this.shadowRootProperty) : null;
    });
  }
}

export class PuppeteerShadowRoot implements ShadowRootRef {
  constructor(
    private readonly handle: ElementHandle<Node>,
    private readonly shadowRootProperty: string
  ) {}

  querySelector(selector: string): Promise<ElementRef | null> {
    return guarded(async () => {
      const element = await this.handle.$(selector);
      return element ? new PuppeteerElement(element, this.shadowRootProperty) : null;
    });
  }

  shadowRoots(): Promise<ShadowRootRef[]> {
    return guarded(async () => {
      const handle = await this.handle.evaluateHandle((root, property) => {
        const roots: ShadowRoot[] = [];
        if (!(root instanceof ShadowRoot)) return roots;
        for (const element of Array.from(root.querySelectorAll("*"))) {
          const attached: unknown = Reflect.get(element, property);
          if (attached instanceof ShadowRoot) roots.push(attached);
        }
        return roots;
      }, this.shadowRootProperty);
      return toShadowRoots(handle, this.shadowRootProperty);
    });
  }
}

export class PuppeteerFrame implements FrameRef {
  constructor(
    private readonly frame: Frame,
    private readonly shadowRootProperty: string = config.shadowRootProperty
  ) {}

  static fromPage(page: Page, shadowRootProperty?: string): PuppeteerFrame {
    return new PuppeteerFrame(page.mainFrame(), shadowRootProperty);
  }

  url(): string {
    return this.frame.url();
  }

  isDetached(): boolean {
    return this.frame.detached;
  }

  querySelector(selector: string): Promise<ElementRef | null> {
    return guarded(async () => {
      const element = await this.frame.$(selector);
      return element ? new PuppeteerElement(element, this.shadowRootProperty) : null;
    });
  }

  async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
    try {
      const handle = await this.frame.waitForFunction(
        (target) =>
          target === "load"
            ? document.readyState === "complete"
            : document.readyState !== "loading",
        { timeout: timeoutMs },
        state
      );
      await handle.dispose();
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new LoadTimeoutError(`Frame did not reach '${state}' in ${timeoutMs}ms`);
      }
      throw translateBrowserError(error);
    }
  }

  bodyText(): Promise<string> {
    return guarded(() => this.frame.$eval("body", (body) => body.innerText));
  }

  shadowRoots(): Promise<ShadowRootRef[]> {
    return guarded(async () => {
      const handle = await this.frame.evaluateHandle((property) => {
        const roots: ShadowRoot[] = [];
        for (const element of Array.from(document.querySelectorAll("*"))) {
          const attached: unknown = Reflect.get(element, property);
          if (attached instanceof ShadowRoot) roots.push(attached);
        }
        return roots;
      }, this.shadowRootProperty);
      return toShadowRoots(handle, this.shadowRootProperty);
    });
  }
}
