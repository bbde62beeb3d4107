// Salt forms that narrow a search without changing the active ingredient.
const SALT_SUFFIXES = ['hcl', 'hydrochloride', 'sulfate', 'sodium', 'potassium'] as const;

export interface SubstanceQuery {
  input: string;
  name: string;
  slug: string;
}

export function normalizeSubstanceName(input: string): string {
  let name = (input || '').trim().replace(/\s+/g, ' ');

  for (const suffix of SALT_SUFFIXES) {
    const tail = ` ${suffix}`;
    if (name.toLowerCase().endsWith(tail)) {
      name = name.slice(0, -tail.length).trim();
    }
  }

  return name;
}

export function createSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

export function toSubstanceQuery(input: string): SubstanceQuery {
  const name = normalizeSubstanceName(input);
  return { input, name, slug: createSlug(name) };
}
