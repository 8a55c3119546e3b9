/**
 * End-to-end listing search: request -> engine -> query snapshot -> in-process
 * store. Exercises the same filter, keyword, sort and paging paths the
 * PostgreSQL executor compiles, against the deterministic dataset.
 */

import { StaticTermProvider } from '@/lib/search/filters';
import { createSearchEngine } from '@/lib/search/search-engine';
import { SearchRequest } from '@/lib/search/search-request';
import { CATEGORY_TERMS, TAG_TERMS } from '../fixtures/listings';
import { InMemoryListingExecutor } from '../utils/in-memory-executor';
import { createMockLogger } from '../utils/mocks';

function setup(perPage = 10) {
  const engine = createSearchEngine({
    archiveUrl: '/listings',
    perPage,
    termProvider: new StaticTermProvider({ listing_category: CATEGORY_TERMS, listing_tag: TAG_TERMS }),
    fields: [{ name: 'neighborhood', searchable: true }],
    filters: [
      { type: 'range', name: 'price', prefix: '$', priority: 20 },
      {
        type: 'select',
        name: 'city',
        options: { austin: 'Austin', dallas: 'Dallas', el_paso: 'El Paso' },
        priority: 30,
      },
    ],
    logger: createMockLogger(),
  });
  const executor = new InMemoryListingExecutor();

  const search = async (query: string) => {
    const result = await engine.orchestrator.getFilteredListings(new SearchRequest(query), executor);
    return { ...result, ids: result.items.map((item) => item.id) };
  };

  return { engine, executor, search };
}

describe('listing search', () => {
  it('returns published listings newest first by default', async () => {
    const { search } = setup();
    const result = await search('');

    expect(result.ids).toEqual(['3', '2', '6', '1', '4']);
    expect(result.total).toBe(5);
  });

  it('matches the keyword in content and searchable fields, once per listing', async () => {
    const { search, executor } = setup();
    const result = await search('keyword=LOFT');

    // Listing 1 matches in its title and two neighborhood rows; listing 5 is a draft
    expect(result.ids).toEqual(['6', '1']);
    expect(result.total).toBe(2);
    expect(executor.executed[0].keywordMetaKeys).toEqual(['_dir_neighborhood']);
  });

  it('ignores a keyword shorter than two characters', async () => {
    const { search } = setup();
    expect((await search('keyword=l')).total).toBe(5);
  });

  it('filters by a numeric range and skips non-numeric values', async () => {
    const { search } = setup();

    expect((await search('price_min=1000&price_max=1300')).ids).toEqual(['6', '1']);
    expect((await search('price_min=1300&price_max=1000')).ids).toEqual(['6', '1']);
    expect((await search('price_max=1000')).ids).toEqual(['2']);
  });

  it('filters by category and by any of several tags', async () => {
    const { search } = setup();

    expect((await search('category=apartment')).ids).toEqual(['3', '1']);
    expect((await search('tag=wifi,parking')).ids).toEqual(['3', '6', '1']);
    expect((await search('tag=wifi&tag=pet-friendly')).ids).toEqual(['3', '2', '1']);
  });

  it('ANDs filters of different kinds together', async () => {
    const { search } = setup();

    expect((await search('city=austin&tag=parking')).ids).toEqual(['1']);
    expect((await search('city=dallas&keyword=cabin&price_min=1000')).ids).toEqual(['6']);
  });

  it('returns nothing when a listing lacks a comparable value', async () => {
    const { search } = setup();
    const result = await search('city=el_paso&price_min=1');

    expect(result.ids).toEqual([]);
    expect(result.totalPages).toBe(1);
  });

  it('sorts by view count with missing counts last and ties by id', async () => {
    const { search } = setup();

    expect((await search('orderby=views')).ids).toEqual(['2', '1', '6', '3', '4']);
    expect((await search('orderby=views&order=asc')).ids).toEqual(['3', '1', '6', '2', '4']);
  });

  it('sorts by title', async () => {
    const { search } = setup();
    expect((await search('orderby=title&order=asc')).ids).toEqual(['4', '3', '6', '2', '1']);
  });

  it('pages through results', async () => {
    const { search } = setup(2);

    const second = await search('paged=2');
    expect(second.ids).toEqual(['6', '1']);
    expect(second).toMatchObject({ total: 5, page: 2, perPage: 2, totalPages: 3 });

    expect((await search('paged=3')).ids).toEqual(['4']);
    expect((await search('paged=9')).ids).toEqual([]);
  });

  it('renders chips whose remove links reproduce the remaining search', async () => {
    const { engine } = setup();
    const request = new SearchRequest('keyword=loft&city=austin&paged=2');

    expect(engine.renderer.getActiveFilterChips(request).map((chip) => [chip.name, chip.removeUrl])).toEqual([
      ['keyword', '/listings?city=austin'],
      ['city', '/listings?keyword=loft'],
    ]);
  });
});
