import { ProtocolViolationError } from '../protocol/errors.js';
import type { ListedItemMap } from '../protocol/schemas.js';
import type { ListKind } from '../protocol/types.js';
import type { ListPage, Session } from '../session/session.js';

/**
 * Walk every page of a list, following `nextCursor` until the server omits it.
 * A server that hands back a cursor it already issued would loop forever;
 * that is reported as a ProtocolViolationError instead.
 */
export async function* iteratePages<K extends ListKind>(
  session: Pick<Session, 'listPage'>,
  kind: K,
  startCursor?: string,
): AsyncGenerator<ListPage<ListedItemMap[K]>> {
  const seen = new Set<string>();
  let cursor = startCursor;

  for (;;) {
    const page = await session.listPage(kind, cursor);
    yield page;

    if (!page.nextCursor) return;
    if (seen.has(page.nextCursor)) {
      throw new ProtocolViolationError(`Server repeated cursor while listing ${kind}`);
    }
    seen.add(page.nextCursor);
    cursor = page.nextCursor;
  }
}

/** Every item of `kind`, in server order. */
export async function fetchAll<K extends ListKind>(
  session: Pick<Session, 'listPage'>,
  kind: K,
): Promise<ListedItemMap[K][]> {
  const items: ListedItemMap[K][] = [];
  for await (const page of iteratePages(session, kind)) {
    items.push(...page.items);
  }
  return items;
}
