import type { ListingSummary } from '../types/listing';
import { formatDisplayDate } from '../lib/utils';

interface ListingResultsProps {
    items: readonly ListingSummary[];
}

export default function ListingResults({ items }: ListingResultsProps) {
    return (
        <ul className="listing-results grid gap-4">
            {items.map((item) => (
                <li key={item.id} className="listing-results__item" data-listing-id={item.id}>
                    <article className="rounded-xl border border-zinc-100 p-4 hover:border-zinc-200 transition-colors">
                        <h3 className="listing-results__title text-base font-semibold text-zinc-900">
                            {item.url ? <a href={item.url}>{item.title}</a> : item.title}
                        </h3>
                        <time className="text-xs text-zinc-400" dateTime={item.createdAt}>
                            {formatDisplayDate(item.createdAt.slice(0, 10))}
                        </time>
                        {item.excerpt && (
                            <p className="listing-results__excerpt text-sm text-zinc-600 mt-1">{item.excerpt}</p>
                        )}
                    </article>
                </li>
            ))}
        </ul>
    );
}
