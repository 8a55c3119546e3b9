/**
 * AppliedFilterChips - list of active filters with remove links
 *
 * Each chip links to the current search minus that filter; "Clear all"
 * links to the bare archive URL.
 */

import { X } from "lucide-react";
import { FilterChip } from "./FilterChip";
import type { FilterChipData } from "./filter-chip-utils";

export interface AppliedFilterChipsProps {
  chips: readonly FilterChipData[];
  clearUrl: string;
}

export function AppliedFilterChips({ chips, clearUrl }: AppliedFilterChipsProps) {
  // Don't render if no chips
  if (chips.length === 0) {
    return null;
  }

  return (
    <div
      className="active-filters relative px-4 py-2 border-b border-zinc-100 dark:border-zinc-800 bg-white dark:bg-zinc-950"
      role="region"
      aria-label="Applied filters"
    >
      <div className="flex items-center gap-2 overflow-x-auto scrollbar-hide">
        <span className="active-filters__label text-sm font-medium text-zinc-500">
          Active filters:
        </span>

        <ul className="active-filters__list flex items-center gap-2 flex-nowrap">
          {chips.map((chip) => (
            <FilterChip key={chip.name} chip={chip} />
          ))}
        </ul>

        <a
          href={clearUrl}
          className="active-filters__clear flex-shrink-0 flex items-center gap-1.5 px-3 py-1.5 text-sm font-medium text-zinc-600 dark:text-zinc-400 hover:text-zinc-900 dark:hover:text-zinc-100 hover:bg-zinc-100 dark:hover:bg-zinc-800 rounded-full transition-colors"
          aria-label="Clear all filters"
        >
          <X className="w-3.5 h-3.5" aria-hidden="true" />
          <span>Clear all</span>
        </a>
      </div>
    </div>
  );
}
