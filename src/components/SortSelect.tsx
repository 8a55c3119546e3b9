import type { OrderbyOption } from '../lib/search/hooks';

interface SortSelectProps {
    options: readonly OrderbyOption[];
    currentOrderby: string;
    currentOrder: string;
}

export default function SortSelect({ options, currentOrderby, currentOrder }: SortSelectProps) {
    return (
        <div className="search-orderby flex items-center gap-2 text-xs font-medium text-zinc-500 dark:text-zinc-400">
            <label htmlFor="search-orderby">Sort by</label>
            <select
                id="search-orderby"
                name="orderby"
                defaultValue={currentOrderby}
                className="search-orderby__select h-9 min-w-[140px] border-none bg-transparent hover:bg-zinc-100 dark:hover:bg-zinc-800 px-3 py-1.5 text-zinc-900 dark:text-white font-semibold text-xs"
            >
                {options.map((option) => (
                    <option key={option.value} value={option.value}>
                        {option.label}
                    </option>
                ))}
            </select>
            {/* Direction travels with the form so changing sort keeps it */}
            <input type="hidden" name="order" value={currentOrder} />
        </div>
    );
}
