/**
 * Structured hash rendering of an entry.
 * Field values are rendered to their textual form.
 */
export type EntryHash = Record<string, string> & {
  key: string;
  type: string;
};

/**
 * Minimal XML element tree produced by per-element renderers.
 * Exporters turn it into a serialized document.
 */
export interface XmlNode {
  tag: string;
  attributes: Record<string, string>;
  children: (XmlNode | string)[];
}
