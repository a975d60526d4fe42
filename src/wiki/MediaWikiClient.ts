import { z } from 'zod';
import { errorMessage, NotFoundError, UpstreamUnavailableError } from '../errors';
import { ImageRef, ItemRecord, Section } from '../types';
import { cleanDescription, limitSentences, splitExtract } from './textCleanup';
import { CategoryMember, WikiSource } from './WikiSource';
import LibLogger from '../logger';

const logger = LibLogger.get('MediaWikiClient');

/** Sections folded into an item description after the lead text */
const DESCRIPTION_SECTIONS = new Set(['Description', 'Biography', 'Background', 'Personality', 'Appearance', 'History']);
const DESCRIPTION_MAX_SENTENCES = 5;

export interface MediaWikiClientOptions {
  /** `api.php` endpoint */
  apiUrl: string;
  /** Article URL prefix, e.g. `https://example.fandom.com/wiki/` */
  baseUrl: string;
  timeoutMs?: number;
  /** Page size for listing calls */
  pageLimit?: number;
  fetchImpl?: typeof fetch;
}

const ApiErrorSchema = z.object({
  error: z.object({ code: z.string(), info: z.string().optional() })
});

const CategoryMembersSchema = z.object({
  query: z.object({
    categorymembers: z.array(z.object({ pageid: z.number().optional(), title: z.string() }))
  }).optional(),
  continue: z.object({ cmcontinue: z.string().optional() }).optional()
});

const AllCategoriesSchema = z.object({
  query: z.object({
    allcategories: z.array(z.object({ category: z.string() }))
  }).optional(),
  continue: z.object({ accontinue: z.string().optional() }).optional()
});

const TitleListSchema = z.array(z.object({ title: z.string() }));

const PageSchema = z.object({
  pageid: z.number().optional(),
  title: z.string(),
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
  fullurl: z.string().optional(),
  extract: z.string().optional(),
  categories: TitleListSchema.optional(),
  images: TitleListSchema.optional(),
  links: TitleListSchema.optional(),
  pageprops: z.record(z.string(), z.string()).optional(),
  imageinfo: z.array(z.object({ url: z.string() })).optional()
});

const PagesSchema = z.object({
  query: z.object({ pages: z.array(PageSchema) }).optional()
});

type WikiPage = z.infer<typeof PageSchema>;

const InfoboxNodeSchema = z.object({ type: z.string(), data: z.unknown() });
const InfoboxFieldSchema = z.object({
  source: z.string().optional(),
  label: z.string().nullable().optional(),
  value: z.unknown()
});

/**
 * WikiSource over the MediaWiki action API, as served by Fandom wikis.
 * Uses the global fetch with a per-request timeout.
 */
export class MediaWikiClient implements WikiSource {
  private readonly apiUrl: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly pageLimit: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MediaWikiClientOptions) {
    this.apiUrl = options.apiUrl;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.pageLimit = options.pageLimit ?? 500;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Article members (namespace 0) of a category, following continuation.
   * A failure after the first page returns the members gathered so far.
   */
  async fetchCategoryMembers(categoryName: string): Promise<CategoryMember[]> {
    const members: CategoryMember[] = [];
    let cursor: string | undefined;

    logger.info('Loading category members', { categoryName });
    do {
      const params: Record<string, string> = {
        list: 'categorymembers',
        cmtitle: `Category:${categoryName}`,
        cmlimit: String(this.pageLimit),
        cmnamespace: '0'
      };
      if (cursor) {
        params.cmcontinue = cursor;
      }

      let page: z.infer<typeof CategoryMembersSchema>;
      try {
        page = await this.query(params, CategoryMembersSchema);
      } catch (error) {
        if (members.length === 0) {
          throw error;
        }
        logger.error('Category listing interrupted, keeping partial result', {
          categoryName,
          loaded: members.length,
          error: errorMessage(error)
        });
        break;
      }

      for (const member of page.query?.categorymembers ?? []) {
        members.push(member.pageid === undefined ? { title: member.title } : { pageid: member.pageid, title: member.title });
      }
      cursor = page.continue?.cmcontinue;
    } while (cursor);

    logger.info('Loaded category members', { categoryName, count: members.length });
    return members;
  }

  async fetchItemMetadata(title: string): Promise<ItemRecord> {
    const response = await this.query({
      titles: title,
      redirects: '1',
      prop: 'info|extracts|categories|images|links|pageprops',
      inprop: 'url',
      explaintext: '1',
      exsectionformat: 'wiki',
      cllimit: '50',
      imlimit: '20',
      pllimit: '50',
      plnamespace: '0',
      ppprop: 'infoboxes'
    }, PagesSchema);

    const page = response.query?.pages[0];
    if (!page || page.missing || page.invalid) {
      throw new NotFoundError(`Wiki page "${title}" not found`);
    }

    const { lead, sections } = splitExtract(page.extract ?? '');
    const item: ItemRecord = {
      title: page.title,
      url: page.fullurl ?? this.articleUrl(page.title),
      description: buildDescription(lead, sections),
      categories: unique((page.categories ?? []).map(category => category.title.replace(/^Category:/, ''))),
      images: await this.resolveImages(page),
      sections: sections
        .map((section): Section => ({ title: section.title, content: cleanDescription(section.content) }))
        .filter(section => section.content.length > 0),
      relatedPages: (page.links ?? []).map(link => link.title),
      infobox: parseInfoboxes(page.pageprops?.infoboxes)
    };
    if (page.pageid !== undefined) {
      item.id = page.pageid;
    }
    return item;
  }

  /**
   * Metadata for every member of a category. Items whose metadata cannot be
   * fetched are left out.
   */
  async scrapeCategory(categoryName: string, limit?: number): Promise<Map<string, ItemRecord>> {
    let members = await this.fetchCategoryMembers(categoryName);
    if (limit !== undefined) {
      members = members.slice(0, limit);
    }

    const items = new Map<string, ItemRecord>();
    let processed = 0;
    for (const member of members) {
      processed++;
      try {
        items.set(member.title, await this.fetchItemMetadata(member.title));
      } catch (error) {
        logger.warning('Skipping item', { categoryName, title: member.title, error: errorMessage(error) });
      }
      if (processed % 10 === 0) {
        logger.info('Scrape progress', { categoryName, processed, total: members.length });
      }
    }

    logger.info('Category scraped', { categoryName, items: items.size, members: members.length });
    return items;
  }

  async fetchAllCategories(): Promise<string[]> {
    const categories: string[] = [];
    let cursor: string | undefined;

    do {
      const params: Record<string, string> = { list: 'allcategories', aclimit: String(this.pageLimit) };
      if (cursor) {
        params.accontinue = cursor;
      }

      let page: z.infer<typeof AllCategoriesSchema>;
      try {
        page = await this.query(params, AllCategoriesSchema);
      } catch (error) {
        if (categories.length === 0) {
          throw error;
        }
        logger.error('Category directory interrupted, keeping partial result', {
          loaded: categories.length,
          error: errorMessage(error)
        });
        break;
      }

      categories.push(...(page.query?.allcategories ?? []).map(entry => entry.category));
      cursor = page.continue?.accontinue;
    } while (cursor);

    logger.info('Loaded category directory', { count: categories.length });
    return categories;
  }

  async ping(): Promise<boolean> {
    try {
      await this.query({ meta: 'siteinfo' }, z.object({ query: z.unknown() }));
      return true;
    } catch (error) {
      logger.warning('Wiki unreachable', { apiUrl: this.apiUrl, error: errorMessage(error) });
      return false;
    }
  }

  articleUrl(title: string): string {
    return `${this.baseUrl}${title.replace(/ /g, '_')}`;
  }

  private async resolveImages(page: WikiPage): Promise<ImageRef[]> {
    const files = (page.images ?? []).map(image => image.title).filter(name => name.startsWith('File:'));
    if (files.length === 0) {
      return [];
    }

    try {
      const response = await this.query({ titles: files.join('|'), prop: 'imageinfo', iiprop: 'url' }, PagesSchema);
      const urls = new Map<string, string>();
      for (const file of response.query?.pages ?? []) {
        const url = file.imageinfo?.[0]?.url;
        if (url) {
          urls.set(file.title, url);
        }
      }
      return files.flatMap(file => {
        const url = urls.get(file);
        return url ? [{ title: file.replace(/^File:/, ''), url }] : [];
      });
    } catch (error) {
      logger.debug('Image URLs unavailable', { title: page.title, error: errorMessage(error) });
      return [];
    }
  }

  private async query<T extends z.ZodTypeAny>(params: Record<string, string>, schema: T): Promise<z.output<T>> {
    const url = new URL(this.apiUrl);
    url.search = new URLSearchParams({ action: 'query', format: 'json', formatversion: '2', ...params }).toString();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new UpstreamUnavailableError(`Wiki request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError(`Wiki answered with status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError('Wiki answered with a non-JSON body', { cause: error });
    }

    const apiError = ApiErrorSchema.safeParse(body);
    if (apiError.success) {
      const { code, info } = apiError.data.error;
      throw new UpstreamUnavailableError(`Wiki API error ${code}${info ? `: ${info}` : ''}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailableError('Unexpected wiki response shape', { cause: parsed.error });
    }
    return parsed.data;
  }
}

const unique = (values: string[]): string[] => Array.from(new Set(values));

/**
 * Lead text plus the biography-style sections, cleaned and capped at five sentences.
 */
export const buildDescription = (lead: string, sections: Array<{ title: string; content: string }>): string | null => {
  const parts: string[] = [];
  if (lead && !lead.startsWith('Sub-Pages')) {
    parts.push(lead);
  }
  for (const section of sections) {
    if (DESCRIPTION_SECTIONS.has(section.title) && section.content) {
      parts.push(section.content);
    }
  }

  if (parts.length === 0) {
    return null;
  }
  const description = limitSentences(cleanDescription(parts.join(' ')), DESCRIPTION_MAX_SENTENCES);
  return description.length > 0 ? description : null;
};

/**
 * Flatten portable-infobox page props into `label -> value`.
 */
export const parseInfoboxes = (raw: string | undefined): Record<string, unknown> => {
  const infobox: Record<string, unknown> = {};
  if (!raw) {
    return infobox;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.debug('Infobox props are not JSON', { error: errorMessage(error) });
    return infobox;
  }

  const visit = (nodes: unknown): void => {
    if (!Array.isArray(nodes)) {
      return;
    }
    for (const candidate of nodes) {
      const node = InfoboxNodeSchema.safeParse(candidate);
      if (!node.success) {
        continue;
      }
      if (node.data.type === 'data') {
        const field = InfoboxFieldSchema.safeParse(node.data.data);
        const name = field.success ? field.data.label ?? field.data.source : undefined;
        if (field.success && name) {
          const value = field.data.value;
          infobox[cleanDescription(name)] = typeof value === 'string' ? cleanDescription(value) : value;
        }
      } else if (node.data.type === 'group') {
        const group = z.object({ value: z.unknown() }).safeParse(node.data.data);
        if (group.success) {
          visit(group.data.value);
        }
      }
    }
  };

  if (Array.isArray(parsed)) {
    for (const box of parsed) {
      const container = z.object({ data: z.unknown() }).safeParse(box);
      if (container.success) {
        visit(container.data.data);
      }
    }
  }
  return infobox;
};
