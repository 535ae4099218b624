/**
 * Shadow/Iframe Locator
 *
 * Walks shadow DOM trees to find what standard selector queries cannot
 * reach. The challenge widget nests its checkbox several shadow levels
 * deep, and the iframe hosting it sits inside one of those roots.
 *
 * The scan is best-effort: a branch that throws (a root torn down by
 * navigation, an iframe detached mid-read) is logged and skipped, and
 * whatever was collected from the other branches is returned.
 *
 * Results are in traversal order only. Callers test every candidate.
 */
import { SHADOW_TRAVERSAL } from "../../config/constants";
import { errorMessage } from "../../shared/errors/challenge.errors";
import {
  ElementRef,
  FrameRef,
  ShadowRootRef,
  ShadowScope,
} from "../../shared/types/dom.types";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";

/**
 * Collect every shadow root reachable from a scope, depth-first.
 * A root is listed before the roots nested inside it.
 */
export async function collectShadowRoots(
  scope: ShadowScope,
  logger: Logger = defaultLogger
): Promise<ShadowRootRef[]> {
  const collected: ShadowRootRef[] = [];
  await walk(scope, 0, collected, logger);
  return collected;
}

async function walk(
  scope: ShadowScope,
  depth: number,
  collected: ShadowRootRef[],
  logger: Logger
): Promise<void> {
  if (depth >= SHADOW_TRAVERSAL.MAX_DEPTH) {
    logger.debug({ depth }, "Shadow traversal depth limit reached");
    return;
  }

  let roots: ShadowRootRef[];
  try {
    roots = await scope.shadowRoots();
  } catch (error) {
    logger.debug(
      { depth, error: errorMessage(error) },
      "Error listing shadow roots, skipping branch"
    );
    return;
  }

  for (const root of roots) {
    collected.push(root);
    await walk(root, depth + 1, collected, logger);
  }
}

/**
 * Find elements matching a selector inside the shadow roots of a scope.
 * Takes the first match of each root.
 */
export async function findInShadow(
  scope: ShadowScope,
  selector: string,
  logger: Logger = defaultLogger
): Promise<ElementRef[]> {
  const elements: ElementRef[] = [];
  const roots = await collectShadowRoots(scope, logger);

  for (const root of roots) {
    try {
      const element = await root.querySelector(selector);
      if (element) elements.push(element);
    } catch (error) {
      logger.debug(
        { selector, error: errorMessage(error) },
        "Error querying shadow root, skipping it"
      );
    }
  }

  return elements;
}

/**
 * Find attached frames of shadow DOM iframes whose src contains srcFilter.
 */
export async function findIframesInShadow(
  scope: ShadowScope,
  srcFilter: string,
  logger: Logger = defaultLogger
): Promise<FrameRef[]> {
  const frames: FrameRef[] = [];
  const iframes = await findInShadow(scope, "iframe", logger);

  for (const iframe of iframes) {
    try {
      const src = await iframe.getProperty("src");
      if (typeof src !== "string" || !src.includes(srcFilter)) continue;

      const frame = await iframe.contentFrame();
      if (!frame || frame.isDetached()) {
        logger.debug({ src }, "Matched iframe has no attached frame, dropping it");
        continue;
      }

      frames.push(frame);
    } catch (error) {
      logger.debug(
        { srcFilter, error: errorMessage(error) },
        "Error resolving shadow iframe, skipping it"
      );
    }
  }

  logger.debug(
    { srcFilter, scanned: iframes.length, matched: frames.length },
    "Shadow iframe scan complete"
  );
  return frames;
}
