/**
 * FilterChip - Individual removable filter chip
 *
 * Shows `label: value` as a pill with a remove link that reloads the
 * search without this filter. Plain links keep removal working without
 * client-side script.
 */

import { X } from "lucide-react";
import { cn } from "../../lib/utils";
import type { FilterChipData } from "./filter-chip-utils";

export interface FilterChipProps {
  chip: FilterChipData;
  /** Additional class names */
  className?: string;
}

export function FilterChip({ chip, className }: FilterChipProps) {
  return (
    <li
      className={cn(
        "active-filters__item",
        "inline-flex items-center gap-1.5 px-3 py-1.5",
        "bg-zinc-100 dark:bg-zinc-800",
        "text-sm text-zinc-700 dark:text-zinc-300",
        "rounded-full",
        className,
      )}
      data-filter={chip.name}
    >
      <span className="active-filters__name font-medium">{chip.label}:</span>
      <span className="active-filters__value max-w-[200px] truncate">{chip.displayValue}</span>
      <a
        href={chip.removeUrl}
        className={cn(
          "active-filters__remove",
          "relative flex items-center justify-center",
          "w-4 h-4 rounded-full",
          "text-zinc-500 hover:bg-zinc-200 hover:text-zinc-700",
          "focus:outline-none focus-visible:ring-2 focus-visible:ring-zinc-400",
        )}
        aria-label={`Remove ${chip.label} filter`}
      >
        <X className="w-3 h-3" aria-hidden="true" />
      </a>
    </li>
  );
}
