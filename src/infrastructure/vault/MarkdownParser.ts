import matter from 'gray-matter';

export interface ParsedMarkdown {
  frontmatter: Record<string, unknown>;
  body: string;
}

export class MarkdownParser {
  /** @throws 當 frontmatter 不是合法 YAML 時由 gray-matter 拋出 */
  parse(rawMarkdown: string): ParsedMarkdown {
    if (!rawMarkdown.trim()) {
      return { frontmatter: {}, body: '' };
    }
    const { data, content } = matter(rawMarkdown);
    return {
      frontmatter: data ?? {},
      body: content ?? '',
    };
  }

  /** 讀取 frontmatter 中的字串欄位；缺少或型別不符時回傳 undefined */
  stringField(rawMarkdown: string, key: string): string | undefined {
    const value = this.parse(rawMarkdown).frontmatter[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
  }
}
