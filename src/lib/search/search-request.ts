/**
 * Immutable view of an incoming request's query parameters.
 *
 * Every resolution step takes one of these explicitly instead of reading
 * ambient request state, so the engine serves HTTP handlers, API routes and
 * scripts the same way.
 */

export type SearchRequestInit =
  | URLSearchParams
  | string
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string | readonly string[] | number | undefined | null>>;

function isIterable(value: object): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}

function collect(init: SearchRequestInit): Array<readonly [string, string]> {
  const params: Array<readonly [string, string]> = [];
  const append = (key: string, value: string) => {
    params.push([key, value]);
  };

  if (typeof init === "string") {
    for (const [key, value] of new URLSearchParams(init)) append(key, value);
    return params;
  }

  if (init instanceof URLSearchParams || isIterable(init)) {
    for (const [key, value] of init) append(key, value);
    return params;
  }

  for (const [key, value] of Object.entries(init)) {
    if (value === undefined || value === null) continue;
    if (typeof value === "string" || typeof value === "number") {
      append(key, String(value));
    } else {
      for (const item of value) append(key, item);
    }
  }
  return params;
}

export class SearchRequest {
  /** Every key/value pair in arrival order, repeats included */
  private readonly entries: ReadonlyArray<readonly [string, string]>;
  private readonly params: ReadonlyMap<string, readonly string[]>;

  constructor(init: SearchRequestInit = {}) {
    this.entries = Object.freeze(collect(init));
    const grouped = new Map<string, string[]>();
    for (const [key, value] of this.entries) {
      const existing = grouped.get(key);
      if (existing) {
        existing.push(value);
      } else {
        grouped.set(key, [value]);
      }
    }
    const frozen = new Map<string, readonly string[]>();
    for (const [key, values] of grouped) {
      frozen.set(key, Object.freeze(values));
    }
    this.params = frozen;
    Object.freeze(this);
  }

  static from(init: SearchRequestInit | SearchRequest): SearchRequest {
    return init instanceof SearchRequest ? init : new SearchRequest(init);
  }

  /** First value of a parameter, or null when absent */
  get(name: string): string | null {
    return this.params.get(name)?.[0] ?? null;
  }

  getAll(name: string): readonly string[] {
    return this.params.get(name) ?? [];
  }

  has(name: string): boolean {
    return this.params.has(name);
  }

  keys(): string[] {
    return [...this.params.keys()];
  }

  get size(): number {
    return this.params.size;
  }

  /**
   * New request without the named parameters; the remaining pairs keep their
   * original order, interleaved repeats included.
   */
  without(names: Iterable<string>): SearchRequest {
    const drop = new Set(names);
    return new SearchRequest(this.entries.filter(([key]) => !drop.has(key)));
  }

  toURLSearchParams(): URLSearchParams {
    const search = new URLSearchParams();
    for (const [key, value] of this.entries) search.append(key, value);
    return search;
  }

  toQueryString(): string {
    return this.toURLSearchParams().toString();
  }
}
