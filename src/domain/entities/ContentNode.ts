/**
 * 來源文件的結構化內容樹（ProseMirror JSON）
 *
 * 只描述轉換器會讀取的欄位；未知的 type 仍可出現，轉換時降級為純文字。
 */
export interface ContentMark {
  type: string;
  attrs?: Record<string, unknown>;
}

export interface ContentNode {
  type: string;
  text?: string;
  attrs?: Record<string, unknown>;
  marks?: ContentMark[];
  content?: ContentNode[];
}
