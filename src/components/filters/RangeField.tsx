/**
 * RangeField - paired min/max inputs for numeric and date ranges
 */

export interface RangeFieldProps {
  id: string;
  minName: string;
  maxName: string;
  minValue: string;
  maxValue: string;
  minPlaceholder: string;
  maxPlaceholder: string;
  inputType: "number" | "date";
  /** Configured bounds, applied to both inputs */
  min?: number | string;
  max?: number | string;
  step?: number;
  prefix?: string;
  suffix?: string;
}

export function RangeField({
  id,
  minName,
  maxName,
  minValue,
  maxValue,
  minPlaceholder,
  maxPlaceholder,
  inputType,
  min,
  max,
  step,
  prefix,
  suffix,
}: RangeFieldProps) {
  const inputClass = "search-filter__input w-full rounded-lg border border-zinc-200 px-3 py-2 text-sm";

  return (
    <div className="search-filter__range-inputs flex items-center gap-2">
      {prefix && <span className="search-filter__prefix text-sm text-zinc-500">{prefix}</span>}
      <input
        type={inputType}
        id={`${id}-min`}
        name={minName}
        defaultValue={minValue}
        placeholder={minPlaceholder}
        aria-label={minPlaceholder}
        min={min}
        max={max}
        step={step}
        className={`${inputClass} search-filter__input--min`}
      />
      <span className="search-filter__range-separator" aria-hidden="true">
        –
      </span>
      <input
        type={inputType}
        id={`${id}-max`}
        name={maxName}
        defaultValue={maxValue}
        placeholder={maxPlaceholder}
        aria-label={maxPlaceholder}
        min={min}
        max={max}
        step={step}
        className={`${inputClass} search-filter__input--max`}
      />
      {suffix && <span className="search-filter__suffix text-sm text-zinc-500">{suffix}</span>}
    </div>
  );
}
