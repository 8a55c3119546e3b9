import { CheckboxFilter, createTagFilter, StaticTermProvider } from "@/lib/search/filters";
import { QueryBuilder } from "@/lib/search/query-builder";
import { SearchRequest } from "@/lib/search/search-request";

const amenityOptions = [
  { value: "wifi", label: "WiFi" },
  { value: "parking", label: "Parking" },
  { value: "pool", label: "Pool" },
];

describe("CheckboxFilter", () => {
  const filter = new CheckboxFilter({ name: "amenity", options: amenityOptions });

  it("reads repeated and comma-separated values against the options", () => {
    const value = filter.getValueFromRequest(new SearchRequest("amenity=wifi&amenity=pool,sauna&amenity=WIFI"));
    expect(value).toEqual(["wifi", "pool"]);
    expect(filter.isActive(value)).toBe(true);
  });

  it("is inactive when nothing valid is ticked", () => {
    const value = filter.getValueFromRequest(new SearchRequest("amenity=sauna"));
    expect(value).toEqual([]);
    expect(filter.isActive(value)).toBe(false);
  });

  it("offers at most maxItems options", () => {
    const limited = new CheckboxFilter({ name: "amenity", options: amenityOptions, maxItems: 2 });

    expect(limited.getOptions().map((option) => option.value)).toEqual(["wifi", "parking"]);
    expect(limited.sanitize(["pool", "wifi"])).toEqual(["wifi"]);
  });

  it("adds an IN clause on the field", () => {
    const query = new QueryBuilder();
    filter.modifyQuery(query, ["wifi", "pool"]);

    expect(query.getAttributeClauses()).toEqual([
      { key: "_dir_amenity", compare: "IN", value: ["wifi", "pool"], type: "CHAR" },
    ]);
  });

  it("joins display labels", () => {
    expect(filter.getDisplayValue(["wifi", "pool"])).toBe("WiFi, Pool");
  });

  it("builds the tag preset over the tag taxonomy", () => {
    const tags = createTagFilter(
      new StaticTermProvider({ listing_tag: [{ value: "pet-friendly", label: "Pet Friendly" }] }),
    );
    const query = new QueryBuilder();
    tags.modifyQuery(query, tags.getValueFromRequest(new SearchRequest("tag=pet-friendly")));

    expect(tags.name).toBe("tag");
    expect(tags.label).toBe("Tags");
    expect(query.getTaxonomyClauses()).toEqual([{ taxonomy: "listing_tag", terms: ["pet-friendly"] }]);
  });
});
