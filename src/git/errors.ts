export class GitError extends Error {
  constructor(message: string, public readonly stderr = '') {
    super(message);
    this.name = 'GitError';
  }
}
