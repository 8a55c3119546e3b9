import type { ReactNode } from 'react';
import { Search, X } from 'lucide-react';
import { cn } from '../lib/utils';

export interface SearchFormProps {
    action: string;
    method: 'get' | 'post';
    /** Marks the form for client-side submission; the markup is the same */
    ajax?: boolean;
    className?: string;
    /** Rendered filter controls, in display order */
    children?: ReactNode;
    /** Sort control, placed after the filters */
    orderby?: ReactNode;
    showSubmit?: boolean;
    /** Bare archive URL for the "Clear Filters" link */
    clearUrl: string;
}

export default function SearchForm({
    action,
    method,
    ajax = false,
    className,
    children,
    orderby,
    showSubmit = true,
    clearUrl,
}: SearchFormProps) {
    return (
        <form
            role="search"
            action={action}
            method={method}
            className={cn('search-form flex flex-col gap-4', className)}
            data-ajax={ajax ? 'true' : undefined}
        >
            <div className="search-form__filters grid gap-4 md:grid-cols-2">{children}</div>

            {orderby}

            {showSubmit && (
                <div className="search-form__actions flex items-center gap-3">
                    <button
                        type="submit"
                        className="search-form__submit inline-flex items-center gap-2 rounded-full bg-zinc-900 px-5 py-2.5 text-sm font-semibold text-white hover:bg-zinc-800"
                    >
                        <Search className="w-4 h-4" aria-hidden="true" />
                        <span>Search</span>
                    </button>
                    <a
                        href={clearUrl}
                        className="search-form__clear inline-flex items-center gap-1.5 text-sm font-medium text-zinc-600 hover:text-zinc-900"
                    >
                        <X className="w-3.5 h-3.5" aria-hidden="true" />
                        <span>Clear Filters</span>
                    </a>
                </div>
            )}
        </form>
    );
}
