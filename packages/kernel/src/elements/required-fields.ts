/**
 * Fields an entry type needs to be considered valid.
 * A nested list names alternatives: any one of them satisfies the requirement.
 */
export const REQUIRED_FIELDS: ReadonlyMap<string, readonly (string | readonly string[])[]> = new Map(Object.entries({
  article: ['author', 'title', 'journal', 'year'],
  book: [['author', 'editor'], 'title', 'publisher', 'year'],
  booklet: ['title'],
  conference: ['author', 'title', 'booktitle', 'year'],
  inbook: [['author', 'editor'], 'title', ['chapter', 'pages'], 'publisher', 'year'],
  incollection: ['author', 'title', 'booktitle', 'publisher', 'year'],
  inproceedings: ['author', 'title', 'booktitle', 'year'],
  manual: ['title'],
  mastersthesis: ['author', 'title', 'school', 'year'],
  misc: [],
  phdthesis: ['author', 'title', 'school', 'year'],
  proceedings: ['title', 'year'],
  techreport: ['author', 'title', 'institution', 'year'],
  unpublished: ['author', 'title', 'note'],
}));

/**
 * Requirements of `type` that none of the given fields satisfy.
 * Unknown types have no requirements.
 */
export function missingFields(
  type: string,
  has: (field: string) => boolean,
): (string | readonly string[])[] {
  const required = REQUIRED_FIELDS.get(type) ?? [];
  return required.filter((requirement) =>
    typeof requirement === 'string' ? !has(requirement) : !requirement.some(has),
  );
}
