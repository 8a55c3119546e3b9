import { FilterDefinitionError } from "@/lib/errors";
import { serverEnv } from "@/lib/env";
import { StaticFieldRegistry } from "@/lib/search/field-registry";
import { RangeFilter, StaticTermProvider } from "@/lib/search/filters";
import { SearchHooks } from "@/lib/search/hooks";
import { createDefaultFilters, createSearchEngine } from "@/lib/search/search-engine";
import { CATEGORY_TERMS, TAG_TERMS } from "../../fixtures/listings";
import { createMockLogger } from "../../utils/mocks";

const names = (engine: ReturnType<typeof createSearchEngine>) =>
  engine.registry.list().map((filter) => filter.name);

describe("createSearchEngine", () => {
  it("registers keyword, category and tag filters by default", () => {
    const engine = createSearchEngine({ logger: createMockLogger() });

    expect(names(engine)).toEqual(["keyword", "category", "tag"]);
    expect(engine.perPage).toBe(serverEnv.SEARCH_PER_PAGE);
    expect(engine.renderer.getClearAllUrl()).toBe(serverEnv.SEARCH_ARCHIVE_URL);
  });

  it("feeds the taxonomy filters from the term provider", () => {
    const engine = createSearchEngine({
      termProvider: new StaticTermProvider({ listing_category: CATEGORY_TERMS, listing_tag: TAG_TERMS }),
      logger: createMockLogger(),
    });

    expect(engine.registry.get("category")?.getOptions()).toEqual(CATEGORY_TERMS);
    expect(engine.registry.get("tag")?.getOptions()).toEqual(TAG_TERMS);
  });

  it("adds extra filters from instances and plain definitions", () => {
    const engine = createSearchEngine({
      registerDefaults: false,
      filters: [
        new RangeFilter({ name: "price", priority: 20 }),
        { type: "select", name: "city", options: { austin: "Austin" }, priority: 15 },
        { type: "date_range", name: "available", priority: 30 },
      ],
      logger: createMockLogger(),
    });

    expect(names(engine)).toEqual(["city", "price", "available"]);
    expect(engine.registry.get("available")?.type).toBe("date_range");
  });

  it("keeps the first filter when a name is reused", () => {
    const log = createMockLogger();
    const engine = createSearchEngine({ filters: [{ type: "keyword", name: "keyword" }], logger: log });

    expect(engine.registry.count()).toBe(3);
    expect(log.warn).toHaveBeenCalledWith("Filter registration rejected: name already registered", {
      name: "keyword",
      type: "keyword",
    });
  });

  it("throws for an invalid filter definition", () => {
    expect(() =>
      createSearchEngine({
        filters: [{ type: "range", name: "price", min: 10, max: 1 }],
        logger: createMockLogger(),
      }),
    ).toThrow(FilterDefinitionError);
  });

  it("accepts content fields as a list or a registry", () => {
    const fromList = createSearchEngine({
      fields: [{ name: "neighborhood", searchable: true }, { name: "price" }],
      logger: createMockLogger(),
    });
    const registry = new StaticFieldRegistry([{ name: "address", searchable: true }]);
    const fromRegistry = createSearchEngine({ fields: registry, logger: createMockLogger() });

    expect(fromList.orchestrator.getSearchableMetaKeys()).toEqual(["_dir_neighborhood"]);
    expect(fromRegistry.fields).toBe(registry);
    expect(fromRegistry.orchestrator.getSearchableMetaKeys()).toEqual(["_dir_address"]);
  });

  it("shares one hooks bus across its parts", () => {
    const hooks = new SearchHooks();
    const registered = jest.fn();
    hooks.on("filterRegistered", registered);

    const engine = createSearchEngine({ hooks, archiveUrl: "/places", perPage: 3, logger: createMockLogger() });

    expect(engine.hooks).toBe(hooks);
    expect(registered).toHaveBeenCalledTimes(3);
    expect(engine.perPage).toBe(3);
    expect(engine.renderer.getClearAllUrl()).toBe("/places");
  });

  it("keeps engines independent", () => {
    const first = createSearchEngine({ logger: createMockLogger() });
    const second = createSearchEngine({ logger: createMockLogger() });

    first.registry.unregister("tag");

    expect(names(first)).toEqual(["keyword", "category"]);
    expect(names(second)).toEqual(["keyword", "category", "tag"]);
  });
});

describe("createDefaultFilters", () => {
  it("orders keyword before category before tag", () => {
    const filters = createDefaultFilters(new StaticTermProvider({}));
    expect(filters.map((filter) => [filter.name, filter.type, filter.definition.priority])).toEqual([
      ["keyword", "keyword", 1],
      ["category", "select", 5],
      ["tag", "checkbox", 10],
    ]);
  });
});
