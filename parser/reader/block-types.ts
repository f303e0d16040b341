/**
 * Tag tree produced by the reader.
 */

export interface Attribute {
  /** Namespace prefix; empty when the name carried none */
  schemaName: string;
  name: string;
  /** Exact text between the two quote characters */
  value: string;
}

export interface Tag {
  /** Namespace prefix; empty when the name carried none */
  schemaName: string;
  name: string;
  attrs: Attribute[];
}

/**
 * An element: its opening tag plus either text content or child blocks.
 * Children are owned by their parent; there are no back references.
 */
export interface Block {
  openingTag: Tag;
  value: string;
  children: Block[];
}

/**
 * Result of reading a name that may carry a `prefix:` qualifier.
 * Without a colon the whole word is in `name` and `prefix` is empty.
 */
export interface QualifiedName {
  prefix: string;
  name: string;
  colonFound: boolean;
}

/**
 * What readOpeningTag() found at the cursor.
 */
export type OpeningTagResult =
  | { kind: 'tag'; tag: Tag; selfClosing: boolean }
  | { kind: 'prolog' }
  | { kind: 'end' };

export function formatTagName(tag: { schemaName: string; name: string }): string {
  return tag.schemaName ? `${tag.schemaName}:${tag.name}` : tag.name;
}

export function createBlock(openingTag: Tag): Block {
  return { openingTag, value: '', children: [] };
}
