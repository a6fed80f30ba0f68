/**
 * Document record model
 *
 * A structured representation of one scientific document as produced by
 * the extraction capability. Immutable once produced.
 *
 * @module models/document
 */

/** Descriptor-style entry, e.g. `{ name: 'temperature', unit: 'K' }` */
export type DocumentEntryObject = Record<string, unknown>;

/** A list entry is either free text or a descriptor object */
export type DocumentEntry = string | DocumentEntryObject;

export interface DocumentRecord {
  claims: DocumentEntry[];
  methods: DocumentEntry[];
  evidence: DocumentEntry[];
  explicit_limitations: DocumentEntry[];
  implicit_limitations: DocumentEntry[];
  variables: DocumentEntry[];
}

/** Fields every DocumentRecord must carry, in reporting order */
export const DOCUMENT_REQUIRED_FIELDS: ReadonlyArray<keyof DocumentRecord> = [
  'claims',
  'methods',
  'evidence',
  'explicit_limitations',
  'implicit_limitations',
  'variables',
];

/** Maximum evidence items kept per document */
export const MAX_EVIDENCE_ITEMS = 2;

/** Raw document text handed to the extraction capability */
export interface SourceDocument {
  title: string;
  text: string;
  /** Where the text came from (file path or 'inline') */
  origin: string;
}

/**
 * Display text for a document entry. Descriptor objects resolve to their
 * `name`, `text` or `description` property, falling back to their JSON form.
 */
export function entryText(entry: DocumentEntry): string {
  if (typeof entry === 'string') {
    return entry;
  }
  for (const key of ['name', 'text', 'description']) {
    const value = entry[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return JSON.stringify(entry);
}
