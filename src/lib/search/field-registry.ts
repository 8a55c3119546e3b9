/**
 * Content field registry boundary.
 *
 * The search engine only needs two things from the platform's custom fields:
 * which fields are searchable by keyword, and the storage key of each.
 */

import { getMetaKey } from "./meta-keys";

export interface ContentField {
  name: string;
  label?: string;
  /** Field values take part in keyword search */
  searchable?: boolean;
}

export interface ContentFieldRegistry {
  getSearchableFields(): readonly ContentField[];
  getMetaKey(fieldName: string): string;
}

export class StaticFieldRegistry implements ContentFieldRegistry {
  private readonly fields: readonly ContentField[];

  constructor(fields: readonly ContentField[] = []) {
    this.fields = [...fields];
  }

  getSearchableFields(): readonly ContentField[] {
    return this.fields.filter((field) => field.searchable === true);
  }

  getMetaKey(fieldName: string): string {
    return getMetaKey(fieldName);
  }
}
