export interface KeywordFieldProps {
  id: string;
  name: string;
  value: string;
  placeholder: string;
  maxLength: number;
}

export function KeywordField({ id, name, value, placeholder, maxLength }: KeywordFieldProps) {
  return (
    <input
      type="search"
      id={id}
      name={name}
      defaultValue={value}
      placeholder={placeholder}
      maxLength={maxLength}
      className="search-filter__input w-full rounded-lg border border-zinc-200 px-3 py-2 text-sm"
    />
  );
}
