import { describe, it, expect, beforeEach } from 'vitest';
import { fetchAll, iteratePages } from '../../src/client/pages.js';
import { ProtocolViolationError } from '../../src/protocol/errors.js';
import { McpServer } from '../../src/server/server.js';
import { textResource } from '../../src/server/resources.js';
import { Session, type ListPage } from '../../src/session/session.js';
import type { ListedItemMap } from '../../src/protocol/schemas.js';
import type { ListKind } from '../../src/protocol/types.js';
import { loopbackTransport } from '../helpers/fake-transport.js';

describe('client pagination', () => {
  let session: Session;

  beforeEach(async () => {
    const server = new McpServer({ name: 'pages', version: '1.0.0', pageSizes: { resources: 4, prompts: 2 } });
    for (let i = 0; i < 10; i++) {
      server.registerResource(textResource(`mem://item/${i}`, `item-${i}`, `#${i}`));
    }
    session = new Session({ transport: loopbackTransport(server) });
    await session.open();
    await session.initialize();
  });

  it('should yield each page in order', async () => {
    const sizes: number[] = [];
    for await (const page of iteratePages(session, 'resources')) {
      sizes.push(page.items.length);
    }
    expect(sizes).toEqual([4, 4, 2]);
  });

  it('should fetch every item across pages exactly once', async () => {
    const all = await fetchAll(session, 'resources');
    expect(all.map(r => r.name)).toEqual(Array.from({ length: 10 }, (_, i) => `item-${i}`));
  });

  it('should return an empty list for an empty collection', async () => {
    expect(await fetchAll(session, 'prompts')).toEqual([]);
  });

  it('should stop on a server that repeats a cursor', async () => {
    const looping = {
      listPage: async <K extends ListKind>(_kind: K, _cursor?: string): Promise<ListPage<ListedItemMap[K]>> => ({
        items: [],
        nextCursor: 'same',
      }),
    };

    await expect(fetchAll(looping, 'tools')).rejects.toBeInstanceOf(ProtocolViolationError);
  });
});
