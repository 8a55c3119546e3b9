import type { FilterOption } from "../../lib/search/filters/types";

export interface CheckboxFieldProps {
  id: string;
  name: string;
  values: readonly string[];
  options: readonly FilterOption[];
}

export function CheckboxField({ id, name, values, options }: CheckboxFieldProps) {
  const checked = new Set(values);

  return (
    <ul className="search-filter__options flex flex-wrap gap-2" role="list">
      {options.map((option) => {
        const optionId = `${id}-${option.value}`;
        return (
          <li key={option.value} className="search-filter__option">
            <label htmlFor={optionId} className="inline-flex items-center gap-1.5 text-sm">
              <input
                type="checkbox"
                id={optionId}
                name={name}
                value={option.value}
                defaultChecked={checked.has(option.value)}
                className="search-filter__checkbox"
              />
              <span>{option.label}</span>
            </label>
          </li>
        );
      })}
    </ul>
  );
}
