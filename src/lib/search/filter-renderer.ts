/**
 * FilterRenderer
 *
 * Server-side markup for the search surfaces: the form, single controls,
 * the sort select, active filter chips and the no-results message.
 * Rendering only reads the registry and the request.
 */

import { createElement, Fragment, type ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import ListingResults from "../../components/ListingResults";
import NoResults from "../../components/NoResults";
import SearchForm from "../../components/SearchForm";
import SortSelect from "../../components/SortSelect";
import { AppliedFilterChips } from "../../components/filters/AppliedFilterChips";
import {
  activeFiltersToChips,
  buildRemoveFilterUrl as buildRemoveUrl,
  type FilterChipData,
} from "../../components/filters/filter-chip-utils";
import type { ListingSummary } from "../../types/listing";
import type { FilterRegistry } from "./filter-registry";
import type { AnyFilter } from "./filters/types";
import type { RenderSurface, SearchHooks } from "./hooks";
import type { SearchQueryOrchestrator } from "./search-query";
import { SearchRequest } from "./search-request";

export type { FilterChipData };

export interface FilterRendererOptions {
  registry: FilterRegistry;
  orchestrator: SearchQueryOrchestrator;
  hooks?: SearchHooks;
  /** Bare collection URL; remove and clear links are built on it */
  archiveUrl: string;
}

export interface SearchFormOptions {
  /** Only these filters, in this order; unknown or disabled names are skipped */
  filters?: readonly string[];
  exclude?: readonly string[];
  showOrderby?: boolean;
  showSubmit?: boolean;
  /** Form action; defaults to the archive URL */
  action?: string;
  method?: "get" | "post";
  ajax?: boolean;
  className?: string;
}

export class FilterRenderer {
  private readonly registry: FilterRegistry;
  private readonly orchestrator: SearchQueryOrchestrator;
  private readonly hooks?: SearchHooks;
  private readonly archiveUrl: string;

  constructor(options: FilterRendererOptions) {
    this.registry = options.registry;
    this.orchestrator = options.orchestrator;
    this.hooks = options.hooks;
    this.archiveUrl = options.archiveUrl;
  }

  renderSearchForm(request: SearchRequest, options: SearchFormOptions = {}): string {
    const {
      filters,
      exclude = [],
      showOrderby = true,
      showSubmit = true,
      action = this.archiveUrl,
      method = "get",
      ajax = false,
      className,
    } = options;

    return this.renderSurface("search-form", request, () => {
      const controls = this.selectFilters(filters, exclude).map((filter) =>
        createElement(Fragment, { key: filter.name }, filter.render(filter.getValueFromRequest(request))),
      );

      return createElement(SearchForm, {
        action,
        method,
        ajax,
        className,
        showSubmit,
        clearUrl: this.archiveUrl,
        orderby: showOrderby ? this.createOrderbyElement(request) : undefined,
        children: controls,
      });
    });
  }

  /** Markup of one filter control; "" for an unknown name */
  renderFilter(name: string, request: SearchRequest): string {
    const filter = this.registry.get(name);
    if (!filter) return "";
    return renderToStaticMarkup(filter.render(filter.getValueFromRequest(request)));
  }

  renderOrderby(request: SearchRequest): string {
    return renderToStaticMarkup(this.createOrderbyElement(request));
  }

  getActiveFilterChips(request: SearchRequest): FilterChipData[] {
    return activeFiltersToChips(this.registry.resolveActive(request), request, this.archiveUrl);
  }

  /** Chip list with remove links and "Clear all"; "" when nothing is active */
  renderActiveFilters(request: SearchRequest): string {
    const chips = this.getActiveFilterChips(request);
    if (chips.length === 0) return "";

    return this.renderSurface("active-filters", request, () =>
      createElement(AppliedFilterChips, { chips, clearUrl: this.getClearAllUrl() }),
    );
  }

  /**
   * Archive URL reproducing the request without the filter's parameter(s)
   * or the page number.
   */
  buildRemoveFilterUrl(filter: Pick<AnyFilter, "getUrlParams">, request: SearchRequest): string {
    return buildRemoveUrl(this.archiveUrl, filter, request);
  }

  getClearAllUrl(): string {
    return this.archiveUrl;
  }

  renderNoResults(request: SearchRequest = new SearchRequest()): string {
    return this.renderSurface("no-results", request, () =>
      createElement(NoResults, { clearUrl: this.getClearAllUrl() }),
    );
  }

  renderResults(items: readonly ListingSummary[]): string {
    return renderToStaticMarkup(createElement(ListingResults, { items }));
  }

  private createOrderbyElement(request: SearchRequest): ReactElement {
    return createElement(SortSelect, {
      options: this.orchestrator.getOrderbyOptions(),
      currentOrderby: this.orchestrator.getCurrentOrderby(request),
      currentOrder: this.orchestrator.getCurrentOrder(request),
    });
  }

  private selectFilters(include: readonly string[] | undefined, exclude: readonly string[]): AnyFilter[] {
    const enabled = this.registry.list();
    const selected = include
      ? include.flatMap((name) => enabled.filter((filter) => filter.name === name))
      : enabled;
    return selected.filter((filter) => !exclude.includes(filter.name));
  }

  private renderSurface(
    surface: RenderSurface,
    request: SearchRequest,
    build: () => ReactElement,
  ): string {
    this.hooks?.emit("beforeRender", surface, request);
    const html = renderToStaticMarkup(build());
    this.hooks?.emit("afterRender", surface, request);
    return html;
  }
}
