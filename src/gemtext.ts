/**
 * Line-oriented gemtext parsing and plain-text rendering
 */

export type GemtextLine =
  | { type: "text"; text: string }
  | { type: "link"; url: string; label: string }
  | { type: "heading"; level: 1 | 2 | 3; text: string }
  | { type: "list"; text: string }
  | { type: "quote"; text: string }
  | { type: "preformatted"; text: string }
  | { type: "toggle"; alt: string };

const LINK_LINE = /^=>[ \t]*(\S+)(?:[ \t]+(.*))?$/;

/**
 * Classify every line of a gemtext document.
 * Lines between preformatting toggles are returned verbatim.
 *
 * @example
 * parseGemtext('# Log\n=> /a.gmi 2024-01-01 First')
 * // [{ type: 'heading', level: 1, text: 'Log' }, { type: 'link', url: '/a.gmi', label: '2024-01-01 First' }]
 */
export function parseGemtext(text: string): GemtextLine[] {
  const lines: GemtextLine[] = [];
  let preformatted = false;

  for (const raw of text.split(/\r?\n/)) {
    if (raw.startsWith("```")) {
      preformatted = !preformatted;
      lines.push({ type: "toggle", alt: raw.slice(3).trim() });
      continue;
    }
    if (preformatted) {
      lines.push({ type: "preformatted", text: raw });
      continue;
    }

    const line = raw.trimEnd();
    if (line.startsWith("=>")) {
      const match = LINK_LINE.exec(line);
      // '=>' with no URL is plain text
      if (match) {
        lines.push({ type: "link", url: match[1], label: (match[2] ?? "").trim() });
        continue;
      }
    } else if (line.startsWith("###")) {
      lines.push({ type: "heading", level: 3, text: line.slice(3).trim() });
      continue;
    } else if (line.startsWith("##")) {
      lines.push({ type: "heading", level: 2, text: line.slice(2).trim() });
      continue;
    } else if (line.startsWith("#")) {
      lines.push({ type: "heading", level: 1, text: line.slice(1).trim() });
      continue;
    } else if (line.startsWith("* ")) {
      lines.push({ type: "list", text: line.slice(2).trim() });
      continue;
    } else if (line.startsWith(">")) {
      lines.push({ type: "quote", text: line.slice(1).trim() });
      continue;
    }

    lines.push({ type: "text", text: line });
  }

  return lines;
}

/**
 * Render parsed gemtext as plain text, one line per source line.
 * Markers are dropped; links keep their label, or the URL when unlabeled.
 */
export function renderPlainText(lines: readonly GemtextLine[]): string {
  const output: string[] = [];

  for (const line of lines) {
    switch (line.type) {
      case "toggle":
        break;
      case "link":
        output.push(line.label || line.url);
        break;
      case "list":
        output.push(`• ${line.text}`);
        break;
      case "text":
      case "heading":
      case "quote":
      case "preformatted":
        output.push(line.text);
        break;
    }
  }

  return output.join("\n");
}
