import { Queryable } from "../../shared/types/dom.types";

/**
 * True when the caller's "page is usable" selector matches.
 * Without a selector the signal is off and this is always false.
 */
export async function detectExpectedContent(
  queryable: Queryable,
  selector?: string | null
): Promise<boolean> {
  if (!selector) return false;

  const element = await queryable.querySelector(selector);
  return element !== null;
}
