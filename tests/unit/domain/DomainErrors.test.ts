import { describe, it, expect } from 'vitest';
import {
  MalformedDocumentError,
  DuplicatePathError,
  FrontmatterSyntaxError,
  ContentRootNotFoundError,
  DocumentUnreadableError,
  PostIndexError,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('MalformedDocumentError is degradable and lists every problem', () => {
    const err = new MalformedDocumentError('_posts/swap', ['missing date', 'missing title']);
    expect(err.classification).toBe('degradable');
    expect(err.code).toBe('MALFORMED_DOCUMENT');
    expect(err.documentPath).toBe('_posts/swap');
    expect(err.problems).toEqual(['missing date', 'missing title']);
    expect(err.message).toBe('Malformed document "_posts/swap": missing date; missing title');
    expect(err.name).toBe('MalformedDocumentError');
    expect(err).toBeInstanceOf(PostIndexError);
    expect(err).toBeInstanceOf(Error);
  });

  it('DuplicatePathError is degradable and names both files', () => {
    const err = new DuplicatePathError('about', 'about.md', 'about.markdown');
    expect(err.classification).toBe('degradable');
    expect(err.code).toBe('DUPLICATE_PATH');
    expect(err.sourceFile).toBe('about.md');
    expect(err.claimedBy).toBe('about.markdown');
    expect(err.message).toBe('Duplicate path "about": about.md collides with about.markdown');
  });

  it('FrontmatterSyntaxError keeps its cause', () => {
    const cause = new Error('bad indentation');
    const err = new FrontmatterSyntaxError('Invalid front matter', { cause });
    expect(err.classification).toBe('degradable');
    expect(err.code).toBe('FRONTMATTER_SYNTAX');
    expect(err.cause).toBe(cause);
  });

  it('DocumentUnreadableError is degradable and names the file', () => {
    const err = new DocumentUnreadableError('_posts/x', '_posts/x.md', { cause: new Error('EACCES: permission denied') });
    expect(err.classification).toBe('degradable');
    expect(err.code).toBe('DOCUMENT_UNREADABLE');
    expect(err.documentPath).toBe('_posts/x');
    expect(err.message).toBe('Cannot read "_posts/x.md": EACCES: permission denied');
  });

  it('ContentRootNotFoundError is fatal', () => {
    const err = new ContentRootNotFoundError('/srv/blog');
    expect(err.classification).toBe('fatal');
    expect(err.contentRoot).toBe('/srv/blog');
    expect(err.message).toBe('Content root "/srv/blog" does not exist or is not a directory');
  });
});
