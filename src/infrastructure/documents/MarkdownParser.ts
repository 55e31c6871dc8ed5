import matter from 'gray-matter';

export interface ParsedMarkdown {
  frontmatter: Record<string, unknown>;
  body: string;
  /** frontmatter title，其次為第一個 H1 */
  title?: string;
}

export class MarkdownParser {
  parse(rawMarkdown: string): ParsedMarkdown {
    if (!rawMarkdown.trim()) {
      return { frontmatter: {}, body: '' };
    }
    const { data, content } = matter(rawMarkdown);
    const frontmatter: Record<string, unknown> = { ...data };
    const body = content ?? '';

    const fmTitle = typeof frontmatter.title === 'string' ? frontmatter.title.trim() : '';
    const headingTitle = /^#\s+(.+)$/m.exec(body)?.[1]?.trim();

    return {
      frontmatter,
      body,
      title: fmTitle || headingTitle || undefined,
    };
  }
}
