import type { FilterOption } from "../../lib/search/filters/types";

export interface SelectFieldProps {
  id: string;
  name: string;
  value: string | readonly string[];
  options: readonly FilterOption[];
  multiple: boolean;
  /** Label of the leading "no selection" option; omitted for multi-selects */
  emptyOption: string;
}

export function SelectField({ id, name, value, options, multiple, emptyOption }: SelectFieldProps) {
  const values = typeof value === "string" ? (value ? [value] : []) : [...value];
  const selected = multiple ? values : values[0] ?? "";

  return (
    <select
      id={id}
      name={name}
      multiple={multiple}
      defaultValue={selected}
      className="search-filter__select w-full rounded-lg border border-zinc-200 px-3 py-2 text-sm"
    >
      {!multiple && <option value="">{emptyOption}</option>}
      {options.map((option) => (
        <option key={option.value} value={option.value}>
          {option.label}
        </option>
      ))}
    </select>
  );
}
