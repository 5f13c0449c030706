import type { ContentMark, ContentNode } from '../../domain/entities/ContentNode.js';

export interface ConversionResult {
  markdown: string;
  /** 遇到的不支援節點型別（已降級為純文字），依首次出現排序 */
  unsupported: string[];
}

interface RenderState {
  lines: string[];
  unsupported: Set<string>;
}

const INLINE_TYPES = new Set(['text', 'hardBreak']);

/**
 * ProseMirror JSON → Markdown
 *
 * 純函式、無共享狀態：同一棵樹每次都輸出完全相同的字串。
 * 支援 heading / paragraph / bulletList / orderedList / codeBlock / blockquote /
 * horizontalRule / hardBreak 與 bold / italic / code / strike / link marks；
 * 其他節點保留其文字內容，並記錄在 unsupported。
 */
export class ProseMirrorConverter {
  convert(tree: ContentNode | undefined): ConversionResult {
    if (!tree) return { markdown: '', unsupported: [] };

    const state: RenderState = { lines: [], unsupported: new Set() };
    const roots = tree.type === 'doc' ? tree.content ?? [] : [tree];
    for (const node of roots) {
      this.renderBlock(node, 0, state);
    }

    const markdown = state.lines
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
    return { markdown, unsupported: [...state.unsupported] };
  }

  /** @param depth - 目前所在的 list 巢狀層數（0 = 不在 list 中） */
  private renderBlock(node: ContentNode, depth: number, state: RenderState): void {
    switch (node.type) {
      case 'heading': {
        const level = clampHeadingLevel(node.attrs?.level);
        state.lines.push(`${'#'.repeat(level)} ${this.renderInline(node.content, state)}`, '');
        return;
      }
      case 'paragraph': {
        const text = this.renderInline(node.content, state);
        if (text.trim()) state.lines.push(text, '');
        return;
      }
      case 'text': {
        const text = this.renderInline([node], state);
        if (text.trim()) state.lines.push(text, '');
        return;
      }
      case 'bulletList':
      case 'orderedList':
        this.renderList(node, depth + 1, state);
        if (depth === 0) state.lines.push('');
        return;
      case 'codeBlock': {
        const language = typeof node.attrs?.language === 'string' ? node.attrs.language : '';
        state.lines.push('```' + language, this.renderInline(node.content, state, true), '```', '');
        return;
      }
      case 'blockquote':
        this.renderBlockquote(node, state);
        return;
      case 'horizontalRule':
        state.lines.push('---', '');
        return;
      case 'hardBreak':
        state.lines.push('');
        return;
      default:
        this.renderUnsupported(node, depth, state);
    }
  }

  private renderList(list: ContentNode, depth: number, state: RenderState): void {
    const start = typeof list.attrs?.start === 'number' ? list.attrs.start : 1;
    let ordinal = start;

    for (const item of list.content ?? []) {
      if (item.type !== 'listItem') {
        this.renderBlock(item, depth, state);
        continue;
      }
      const bullet = list.type === 'orderedList' ? `${ordinal}.` : '-';
      ordinal++;
      this.renderListItem(item, bullet, depth, state);
    }
  }

  private renderListItem(item: ContentNode, bullet: string, depth: number, state: RenderState): void {
    const [first, ...rest] = item.content ?? [];
    if (!first) return;

    const indent = '  '.repeat(depth - 1);
    if (first.type === 'paragraph') {
      state.lines.push(`${indent}${bullet} ${this.renderInline(first.content, state)}`);
    } else {
      this.renderBlock(first, depth, state);
    }

    for (const child of rest) {
      if (child.type === 'paragraph') {
        const text = this.renderInline(child.content, state);
        if (text.trim()) state.lines.push(`${'  '.repeat(depth)}${text}`);
      } else if (child.type === 'bulletList' || child.type === 'orderedList') {
        this.renderList(child, depth + 1, state);
      } else {
        this.renderBlock(child, depth, state);
      }
    }
  }

  private renderBlockquote(node: ContentNode, state: RenderState): void {
    const inner: RenderState = { lines: [], unsupported: state.unsupported };
    for (const child of node.content ?? []) {
      this.renderBlock(child, 0, inner);
    }
    while (inner.lines.length > 0 && inner.lines[inner.lines.length - 1] === '') {
      inner.lines.pop();
    }
    for (const line of inner.lines) {
      state.lines.push(line.trim() ? `> ${line}` : '>');
    }
    state.lines.push('');
  }

  /** 不支援的節點：只含 inline 子節點時輸出成一段文字，否則逐一渲染子區塊 */
  private renderUnsupported(node: ContentNode, depth: number, state: RenderState): void {
    state.unsupported.add(node.type);
    const children = node.content ?? [];

    if (children.length > 0 && !children.every(isInlineNode)) {
      for (const child of children) this.renderBlock(child, depth, state);
      return;
    }

    const text = children.length > 0 ? this.renderInline(children, state) : node.text ?? '';
    if (text.trim()) state.lines.push(text, '');
  }

  private renderInline(
    content: ContentNode[] | undefined,
    state: RenderState,
    preserveNewlines = false,
  ): string {
    if (!content) return '';

    return content.map((node) => {
      if (node.type === 'text') {
        return applyMarks(node.text ?? '', node.marks ?? []);
      }
      if (node.type === 'hardBreak') {
        return preserveNewlines ? '\n' : ' ';
      }
      state.unsupported.add(node.type);
      if (typeof node.text === 'string') return node.text;
      if (node.content) return this.renderInline(node.content, state, preserveNewlines);
      return typeof node.attrs?.label === 'string' ? node.attrs.label : '';
    }).join('');
  }
}

function isInlineNode(node: ContentNode): boolean {
  return INLINE_TYPES.has(node.type) || (typeof node.text === 'string' && !node.content);
}

function clampHeadingLevel(raw: unknown): number {
  const level = typeof raw === 'number' ? Math.trunc(raw) : 1;
  return Math.min(6, Math.max(1, level));
}

function applyMarks(text: string, marks: ContentMark[]): string {
  let out = text;
  for (const mark of marks) {
    switch (mark.type) {
      case 'bold':
        out = `**${out}**`;
        break;
      case 'italic':
        out = `*${out}*`;
        break;
      case 'code':
        out = `\`${out}\``;
        break;
      case 'strike':
        out = `~~${out}~~`;
        break;
      case 'link': {
        const href = typeof mark.attrs?.href === 'string' ? mark.attrs.href : '';
        out = `[${out}](${href})`;
        break;
      }
      default:
        break;
    }
  }
  return out;
}
