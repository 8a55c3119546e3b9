import { type ClassValue, clsx } from "clsx"
import { twMerge } from "tailwind-merge"

export function cn(...inputs: ClassValue[]) {
    return twMerge(clsx(inputs))
}

/**
 * Parse a YYYY-MM-DD date string as local date (not UTC)
 * Fixes timezone bug where new Date("2025-01-15") is parsed as UTC midnight
 * which can appear as the previous day in timezones behind UTC
 */
export function parseLocalDate(dateStr: string): Date {
    const [year, month, day] = dateStr.split('-').map(Number);
    return new Date(year, month - 1, day);
}

/**
 * Format a YYYY-MM-DD date for display, e.g. "Mar 1, 2026"
 */
export function formatDisplayDate(dateStr: string): string {
    const date = parseLocalDate(dateStr);
    if (isNaN(date.getTime())) return dateStr;
    return date.toLocaleDateString("en-US", {
        month: "short",
        day: "numeric",
        year: "numeric",
    });
}

/**
 * Title-case a machine name: "price_range" -> "Price Range"
 */
export function humanizeName(name: string): string {
    return name
        .replace(/[_-]+/g, " ")
        .trim()
        .replace(/(^|\s)(\S)/g, (_match, space: string, char: string) => space + char.toUpperCase())
}
