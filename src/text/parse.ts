import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import type { Root, Nodes } from "mdast";

const parser = unified().use(remarkParse).use(remarkGfm);

export function parseMarkdown(source: string): Root {
  return parser.parse(source);
}

/**
 * Extract the prose of a Markdown document, one top-level block per line.
 * Markup (heading markers, emphasis, link targets, table pipes) is dropped
 * so it cannot register as shared wording.
 */
export function markdownToPlainText(source: string): string {
  return parseMarkdown(source)
    .children.map((block) => nodeToText(block))
    .filter((text) => text.trim() !== "")
    .join("\n");
}

function nodeToText(node: Nodes): string {
  switch (node.type) {
    case "text":
    case "inlineCode":
    case "code":
      return node.value;
    case "html":
      // Inline tags such as <br> separate the words around them
      return " ";
    case "yaml":
    case "definition":
    case "thematicBreak":
      return "";
    case "image":
      return node.alt ?? "";
    case "break":
      return "\n";
    case "list":
    case "listItem":
    case "table":
    case "blockquote":
    case "footnoteDefinition":
      // Block containers: keep children on separate lines
      return childrenToText(node.children, "\n");
    case "tableRow":
      return childrenToText(node.children, " ");
    default:
      if ("children" in node) {
        return childrenToText(node.children, "");
      }
      return "";
  }
}

function childrenToText(children: readonly Nodes[], separator: string): string {
  return children.map(nodeToText).join(separator);
}
