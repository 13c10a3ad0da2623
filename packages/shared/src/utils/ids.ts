/**
 * Source of bibliography handles. Inject a fixed one in tests.
 */
export interface IdGenerator {
  generate(prefix: string): string;
}

export const defaultIdGenerator: IdGenerator = {
  generate: (prefix) => `${prefix}-${globalThis.crypto.randomUUID()}`,
};

/**
 * Handle under which a bibliography registers itself, e.g.
 * `bib-3b241101-e2bb-4255-8caf-4136c566a962`.
 */
export function generateBibliographyId(idGenerator: IdGenerator = defaultIdGenerator): string {
  return idGenerator.generate('bib');
}
