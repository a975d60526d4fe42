import { describe, expect, it, vi } from 'vitest';
import { NotFoundError, UpstreamUnavailableError } from '../../src/errors';
import { buildDescription, MediaWikiClient, parseInfoboxes } from '../../src/wiki/MediaWikiClient';

type Handler = (params: URLSearchParams) => Response | Promise<Response>;

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const paramsOf = (input: string | URL | Request): URLSearchParams =>
  (input instanceof URL ? input : new URL(typeof input === 'string' ? input : input.url)).searchParams;

const createClient = (handler: Handler) => {
  const fetchImpl = vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
    handler(paramsOf(input)));
  const client = new MediaWikiClient({
    apiUrl: 'https://wiki.test/api.php',
    baseUrl: 'https://wiki.test/wiki/',
    timeoutMs: 1000,
    pageLimit: 2,
    fetchImpl
  });
  return { client, fetchImpl };
};

const infoboxProps = JSON.stringify([
  {
    data: [
      { type: 'title', data: { value: 'Jackie Welles' } },
      { type: 'data', data: { source: 'affiliation', label: 'Affiliation', value: '<a href="/wiki/Valentinos">Valentinos</a>' } },
      {
        type: 'group',
        data: { value: [{ type: 'data', data: { source: 'born', label: null, value: '2051' } }] }
      }
    ]
  }
]);

const jackiePage = {
  pageid: 42,
  title: 'Jackie Welles',
  fullurl: 'https://wiki.test/wiki/Jackie_Welles',
  extract: [
    'Jackie is a mercenary. Jackie is a mercenary.',
    '== Biography ==',
    'Born in Heywood.',
    '== Trivia ==',
    'Loves tequila.',
    '== Gallery ==',
    ''
  ].join('\n'),
  categories: [{ title: 'Category:Characters' }, { title: 'Category:Characters' }, { title: 'Category:Mercenaries' }],
  images: [{ title: 'File:Jackie.png' }, { title: 'Jackie-icon.png' }],
  links: [{ title: 'V (character)' }],
  pageprops: { infoboxes: infoboxProps }
};

describe('MediaWikiClient', () => {
  describe('Requests', () => {
    it('should send query requests in JSON format version 2', async () => {
      const { client, fetchImpl } = createClient(() => json({ query: { categorymembers: [] } }));

      await client.fetchCategoryMembers('Weapons');

      const params = paramsOf(fetchImpl.mock.calls[0]?.[0] ?? '');
      expect(Object.fromEntries(params)).toEqual({
        action: 'query',
        format: 'json',
        formatversion: '2',
        list: 'categorymembers',
        cmtitle: 'Category:Weapons',
        cmlimit: '2',
        cmnamespace: '0'
      });
    });

    it('should raise UpstreamUnavailableError for a failing status', async () => {
      const { client } = createClient(() => json({}, 503));
      await expect(client.fetchCategoryMembers('Weapons')).rejects.toThrow(UpstreamUnavailableError);
      await expect(client.fetchCategoryMembers('Weapons')).rejects.toThrow('Wiki answered with status 503');
    });

    it('should raise UpstreamUnavailableError for API errors', async () => {
      const { client } = createClient(() => json({ error: { code: 'badtitle', info: 'Bad title' } }));
      await expect(client.fetchAllCategories()).rejects.toThrow('Wiki API error badtitle: Bad title');
    });

    it('should raise UpstreamUnavailableError when the request fails', async () => {
      const { client } = createClient(() => {
        throw new Error('socket hang up');
      });
      await expect(client.fetchItemMetadata('V')).rejects.toThrow('Wiki request failed: socket hang up');
    });

    it('should raise UpstreamUnavailableError for a body that is not JSON', async () => {
      const { client } = createClient(() => new Response('<html>maintenance</html>', { status: 200 }));
      await expect(client.fetchAllCategories()).rejects.toThrow('Wiki answered with a non-JSON body');
    });

    it('should raise UpstreamUnavailableError for a body of the wrong shape', async () => {
      const { client } = createClient(() => json({ query: { categorymembers: 'none' } }));
      await expect(client.fetchCategoryMembers('Weapons')).rejects.toThrow('Unexpected wiki response shape');
    });
  });

  describe('fetchCategoryMembers', () => {
    it('should follow continuation', async () => {
      const { client, fetchImpl } = createClient(params => params.get('cmcontinue') === 'page2'
        ? json({ query: { categorymembers: [{ pageid: 3, title: 'Overture' }] } })
        : json({
          query: { categorymembers: [{ pageid: 1, title: 'Skippy' }, { title: 'Malorian Arms 3516' }] },
          continue: { cmcontinue: 'page2' }
        }));

      expect(await client.fetchCategoryMembers('Weapons')).toEqual([
        { pageid: 1, title: 'Skippy' },
        { title: 'Malorian Arms 3516' },
        { pageid: 3, title: 'Overture' }
      ]);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('should keep the members gathered before a later page failed', async () => {
      const { client } = createClient(params => params.get('cmcontinue') === 'page2'
        ? json({}, 500)
        : json({ query: { categorymembers: [{ pageid: 1, title: 'Skippy' }] }, continue: { cmcontinue: 'page2' } }));

      expect(await client.fetchCategoryMembers('Weapons')).toEqual([{ pageid: 1, title: 'Skippy' }]);
    });
  });

  describe('fetchItemMetadata', () => {
    it('should build an item record from the page', async () => {
      const { client } = createClient(params => params.get('prop') === 'imageinfo'
        ? json({ query: { pages: [{ title: 'File:Jackie.png', imageinfo: [{ url: 'https://img.test/Jackie.png' }] }] } })
        : json({ query: { pages: [jackiePage] } }));

      expect(await client.fetchItemMetadata('Jackie Welles')).toEqual({
        id: 42,
        title: 'Jackie Welles',
        url: 'https://wiki.test/wiki/Jackie_Welles',
        description: 'Jackie is a mercenary. Born in Heywood.',
        categories: ['Characters', 'Mercenaries'],
        images: [{ title: 'Jackie.png', url: 'https://img.test/Jackie.png' }],
        sections: [
          { title: 'Biography', content: 'Born in Heywood.' },
          { title: 'Trivia', content: 'Loves tequila.' }
        ],
        relatedPages: ['V (character)'],
        infobox: { Affiliation: 'Valentinos', born: '2051' }
      });
    });

    it('should fall back to the article URL and keep going without image URLs', async () => {
      const { client } = createClient(params => params.get('prop') === 'imageinfo'
        ? json({}, 500)
        : json({ query: { pages: [{ title: 'Night City', images: [{ title: 'File:Map.png' }] }] } }));

      const item = await client.fetchItemMetadata('Night City');

      expect(item.url).toBe('https://wiki.test/wiki/Night_City');
      expect(item.images).toEqual([]);
      expect(item.description).toBeNull();
      expect('id' in item).toBe(false);
    });

    it('should raise NotFoundError for a missing page', async () => {
      const { client } = createClient(() => json({ query: { pages: [{ title: 'Nope', missing: true }] } }));
      await expect(client.fetchItemMetadata('Nope')).rejects.toThrow(NotFoundError);
      await expect(client.fetchItemMetadata('Nope')).rejects.toThrow('Wiki page "Nope" not found');
    });
  });

  describe('scrapeCategory', () => {
    const handler: Handler = params => {
      if (params.get('list') === 'categorymembers') {
        return json({ query: { categorymembers: [{ title: 'Skippy' }, { title: 'Gone' }, { title: 'Overture' }] } });
      }
      const title = params.get('titles') ?? '';
      return title === 'Gone'
        ? json({ query: { pages: [{ title, missing: true }] } })
        : json({ query: { pages: [{ title, fullurl: `https://wiki.test/wiki/${title}` }] } });
    };

    it('should leave out items whose metadata cannot be fetched', async () => {
      const { client } = createClient(handler);
      const items = await client.scrapeCategory('Weapons');
      expect(Array.from(items.keys())).toEqual(['Skippy', 'Overture']);
    });

    it('should only fetch up to the limit', async () => {
      const { client, fetchImpl } = createClient(handler);
      const items = await client.scrapeCategory('Weapons', 1);
      expect(Array.from(items.keys())).toEqual(['Skippy']);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });
  });

  describe('fetchAllCategories', () => {
    it('should follow continuation', async () => {
      const { client } = createClient(params => params.get('accontinue') === 'next'
        ? json({ query: { allcategories: [{ category: 'Weapons' }] } })
        : json({ query: { allcategories: [{ category: 'Characters' }, { category: 'Vehicles' }] }, continue: { accontinue: 'next' } }));

      expect(await client.fetchAllCategories()).toEqual(['Characters', 'Vehicles', 'Weapons']);
    });
  });

  describe('ping', () => {
    it('should report a reachable wiki', async () => {
      const { client } = createClient(() => json({ query: { general: {} } }));
      expect(await client.ping()).toBe(true);
    });

    it('should report an unreachable wiki', async () => {
      const { client } = createClient(() => json({}, 502));
      expect(await client.ping()).toBe(false);
    });
  });

  describe('helpers', () => {
    it('should cap descriptions at five sentences', () => {
      expect(buildDescription('One. Two. Three. Four. Five. Six. Seven.', [])).toBe('One. Two. Three. Four. Five.');
    });

    it('should only fold biography-style sections into the description', () => {
      expect(buildDescription('', [
        { title: 'Trivia', content: 'Fact.' },
        { title: 'Appearance', content: 'Tall.' }
      ])).toBe('Tall.');
    });

    it('should skip sub-page leads', () => {
      expect(buildDescription('Sub-Pages:Gallery', [])).toBeNull();
    });

    it('should ignore infobox props that are not JSON', () => {
      expect(parseInfoboxes('{broken')).toEqual({});
      expect(parseInfoboxes(undefined)).toEqual({});
    });
  });
});
