/**
 * FilterField - wrapper shared by every filter control
 *
 * Carries the BEM-style hooks (`search-filter--<type>`, `search-filter--<name>`,
 * `search-filter--active`) themes and client scripts target.
 */

import type { ReactNode } from "react";
import { cn } from "../../lib/utils";

export interface FilterFieldProps {
  name: string;
  type: string;
  label: string;
  /** Whether the current request gives this filter an active value */
  active: boolean;
  /** id of the single control the label describes; groups get a legend instead */
  htmlFor?: string;
  className?: string;
  children: ReactNode;
}

export function FilterField({
  name,
  type,
  label,
  active,
  htmlFor,
  className,
  children,
}: FilterFieldProps) {
  const classes = cn(
    "search-filter",
    `search-filter--${type.replace(/_/g, "-")}`,
    `search-filter--${name}`,
    active && "search-filter--active",
    "flex flex-col gap-1.5",
    className,
  );

  if (htmlFor) {
    return (
      <div className={classes} data-filter={name} data-filter-type={type}>
        <label htmlFor={htmlFor} className="search-filter__label text-sm font-medium text-zinc-700">
          {label}
        </label>
        {children}
      </div>
    );
  }

  return (
    <fieldset className={classes} data-filter={name} data-filter-type={type}>
      <legend className="search-filter__label text-sm font-medium text-zinc-700">{label}</legend>
      {children}
    </fieldset>
  );
}
