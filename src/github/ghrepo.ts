/** A repository on a single GitHub host, identified by owner and name. */
export interface RepoRef {
  owner: string;
  name: string;
}

export function fullName(ref: RepoRef): string {
  return `${ref.owner}/${ref.name}`;
}

/** GitHub treats owner and repository names case-insensitively. */
export function isSameRepo(a: RepoRef, b: RepoRef): boolean {
  return a.owner.toLowerCase() === b.owner.toLowerCase()
    && a.name.toLowerCase() === b.name.toLowerCase();
}

export function parseFullName(text: string): RepoRef {
  const parts = text.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`Expected "OWNER/REPO", got "${text}"`);
  }
  return { owner: parts[0], name: parts[1] };
}
