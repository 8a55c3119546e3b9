import { SearchHooks } from "@/lib/search/hooks";
import { SearchRequest } from "@/lib/search/search-request";

describe("SearchHooks", () => {
  it("calls event listeners in subscription order", () => {
    const hooks = new SearchHooks();
    const calls: string[] = [];
    const request = new SearchRequest();

    hooks.on("beforeRender", (surface) => calls.push(`first:${surface}`));
    hooks.on("beforeRender", (surface) => calls.push(`second:${surface}`));
    hooks.emit("beforeRender", "search-form", request);

    expect(calls).toEqual(["first:search-form", "second:search-form"]);
  });

  it("unsubscribes", () => {
    const hooks = new SearchHooks();
    const listener = jest.fn();
    const off = hooks.on("afterRender", listener);

    off();
    hooks.emit("afterRender", "no-results", new SearchRequest());

    expect(listener).not.toHaveBeenCalled();
    expect(hooks.listenerCount("afterRender")).toBe(0);
  });

  it("doesn't skip the next listener when one unsubscribes itself", () => {
    const hooks = new SearchHooks();
    const second = jest.fn();
    const off = hooks.on("afterRender", () => off());
    hooks.on("afterRender", second);

    hooks.emit("afterRender", "active-filters", new SearchRequest());

    expect(second).toHaveBeenCalledTimes(1);
    expect(hooks.listenerCount("afterRender")).toBe(1);
  });

  it("threads values through value hooks", () => {
    const hooks = new SearchHooks();
    hooks.addValueHook("searchableMetaKeys", (keys) => [...keys, "_dir_city"]);
    hooks.addValueHook("searchableMetaKeys", (keys) => keys.map((key) => key.toUpperCase()));

    expect(hooks.applyValueHooks("searchableMetaKeys", ["_dir_zip"])).toEqual(["_DIR_ZIP", "_DIR_CITY"]);
  });

  it("returns the value unchanged without hooks", () => {
    const hooks = new SearchHooks();
    const options = [{ value: "date", label: "Newest First" }];
    expect(hooks.applyValueHooks("orderbyOptions", options)).toBe(options);
  });
});
