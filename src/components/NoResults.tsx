import { SearchX } from 'lucide-react';

interface NoResultsProps {
    /** Bare archive URL */
    clearUrl: string;
}

export default function NoResults({ clearUrl }: NoResultsProps) {
    return (
        <div className="search-no-results text-center py-12 px-4">
            <SearchX className="mx-auto mb-4 w-10 h-10 text-zinc-300" aria-hidden="true" />
            <h2 className="search-no-results__title text-lg font-semibold text-zinc-900">
                No listings found
            </h2>
            <p className="search-no-results__message text-zinc-500 text-sm mt-2">
                No listings match your current search criteria. Try adjusting your filters or search terms.
            </p>
            <a
                href={clearUrl}
                className="search-no-results__reset inline-block mt-4 text-sm font-medium text-zinc-900 underline underline-offset-4"
            >
                View all listings
            </a>
        </div>
    );
}
