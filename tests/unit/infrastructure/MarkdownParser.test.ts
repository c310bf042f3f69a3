import { describe, it, expect } from 'vitest';
import { MarkdownParser } from '../../../src/infrastructure/content/MarkdownParser.js';
import { FrontmatterSyntaxError } from '../../../src/domain/errors/DomainErrors.js';

describe('MarkdownParser', () => {
  const parser = new MarkdownParser();

  it('should extract frontmatter and body', () => {
    const md = `---
layout: post
title: Swapping tokens from a script
date: 2024-04-04 10:00:00 +0800
tags: [blockchains]
---

## Setup

Body text here.`;

    const result = parser.parse(md);
    expect(result.hasFrontmatter).toBe(true);
    expect(result.frontmatter.title).toBe('Swapping tokens from a script');
    expect(result.frontmatter.tags).toEqual(['blockchains']);
    expect(result.body).toContain('## Setup');
    expect(result.body).toContain('Body text here.');
  });

  it('should turn an unquoted YAML date into a Date', () => {
    const result = parser.parse('---\ntitle: x\ndate: 2024-04-05\n---\nBody');
    expect(result.frontmatter.date).toBeInstanceOf(Date);
  });

  it('should report markdown without frontmatter', () => {
    const md = '# Just a heading\n\nSome content.';
    const result = parser.parse(md);
    expect(result.hasFrontmatter).toBe(false);
    expect(result.frontmatter).toEqual({});
    expect(result.body).toBe(md);
  });

  it('should read front matter after a UTF-8 BOM', () => {
    const result = parser.parse('\uFEFF---\ntitle: X\ndate: 2024-01-01\n---\nBody\n');
    expect(result.hasFrontmatter).toBe(true);
    expect(result.frontmatter.title).toBe('X');
    expect(result.body).toBe('Body\n');
  });

  it('should normalize CRLF line endings', () => {
    const result = parser.parse('---\r\ntitle: Windows\r\n---\r\nLine one\r\nLine two\r\n');
    expect(result.hasFrontmatter).toBe(true);
    expect(result.frontmatter.title).toBe('Windows');
    expect(result.body).toBe('Line one\nLine two\n');
  });

  it('should handle empty content', () => {
    const result = parser.parse('');
    expect(result.hasFrontmatter).toBe(false);
    expect(result.frontmatter).toEqual({});
    expect(result.body).toBe('');
  });

  it('should throw FrontmatterSyntaxError on invalid YAML', () => {
    const md = '---\ntitle: [unclosed\n---\nBody';
    expect(() => parser.parse(md)).toThrow(FrontmatterSyntaxError);
  });

  it('should not share parsed data between calls', () => {
    const md = '---\ntitle: Same\n---\nBody';
    const first = parser.parse(md);
    first.frontmatter.title = 'Changed';
    expect(parser.parse(md).frontmatter.title).toBe('Same');
  });
});
