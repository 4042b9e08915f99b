/**
 * BookAssembler: packages chapters into an EPUB 3 file
 *
 * The archive also carries an NCX table of contents so that EPUB 2
 * readers can navigate it.
 */

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import JSZip from "jszip";
import { AssemblyError, errorMessage, WriteError } from "./errors.js";
import type { Book, BookMetadata, Chapter } from "./types.js";
import { escapeXml } from "./utils.js";

/** Manifest entry for one chapter file */
interface ChapterFile {
  id: string;
  href: string;
  title: string;
}

const STYLESHEET = `body {
  font-family: serif;
  line-height: 1.6;
  margin: 1em;
}
h1 {
  line-height: 1.3;
  margin-bottom: 1em;
}
p {
  margin: 0.5em 0;
}
`;

/**
 * Derive a stable urn:uuid identifier from a string (the feed URL),
 * so that the same feed always yields the same book identifier.
 *
 * @example
 * bookIdentifier('gemini://example.org/gemlog/') // 'urn:uuid:xxxxxxxx-xxxx-5xxx-yxxx-xxxxxxxxxxxx'
 */
export function bookIdentifier(source: string): string {
  const hex = createHash("sha1").update(source).digest("hex");
  // Name-based UUID layout: version 5, RFC 4122 variant
  const variant = ((parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return `urn:uuid:${hex.slice(0, 8)}-${hex.slice(8, 12)}-5${hex.slice(13, 16)}-${variant}${hex.slice(17, 20)}-${hex.slice(20, 32)}`;
}

/**
 * Format a timestamp the way dcterms:modified expects (no milliseconds).
 *
 * @example
 * formatModified('2024-03-01T10:20:30.456Z') // '2024-03-01T10:20:30Z'
 */
export function formatModified(iso: string): string {
  return new Date(iso).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Chapter file name for a zero-based chapter index.
 *
 * @example
 * chapterFileName(0) // 'chapter-001.xhtml'
 */
export function chapterFileName(index: number): string {
  return `chapter-${String(index + 1).padStart(3, "0")}.xhtml`;
}

/**
 * Build a Book from metadata and ordered chapters.
 *
 * @throws {AssemblyError} If there are no chapters
 */
export function assembleBook(metadata: BookMetadata, chapters: readonly Chapter[]): Book {
  if (chapters.length === 0) {
    throw new AssemblyError("No chapters to package: the feed has no entries");
  }
  return { metadata, chapters: [...chapters] };
}

/**
 * Render one chapter as an XHTML document.
 * Each non-blank body line becomes a paragraph.
 */
export function renderChapterXhtml(chapter: Chapter, language: string): string {
  const paragraphs = chapter.body
    .split("\n")
    .map(escapeXml)
    .filter((line) => line.trim() !== "")
    .map((line) => `    <p>${line}</p>`)
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xml:lang="${escapeXml(language)}" lang="${escapeXml(language)}">
<head>
  <title>${escapeXml(chapter.title)}</title>
  <link rel="stylesheet" type="text/css" href="styles.css"/>
</head>
<body>
  <section>
    <h1>${escapeXml(chapter.title)}</h1>
${paragraphs}
  </section>
</body>
</html>
`;
}

/**
 * Render the package document (metadata, manifest, spine).
 */
export function renderPackageDocument(metadata: BookMetadata, files: readonly ChapterFile[]): string {
  const manifestItems = [
    `    <item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>`,
    `    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>`,
    `    <item id="styles" href="styles.css" media-type="text/css"/>`,
    ...files.map((file) => `    <item id="${file.id}" href="${file.href}" media-type="application/xhtml+xml"/>`),
  ].join("\n");

  const spineItems = files.map((file) => `    <itemref idref="${file.id}"/>`).join("\n");
  const creator = metadata.author ? `\n    <dc:creator>${escapeXml(metadata.author)}</dc:creator>` : "";

  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="bookid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="bookid">${escapeXml(metadata.identifier)}</dc:identifier>
    <dc:title>${escapeXml(metadata.title)}</dc:title>${creator}
    <dc:language>${escapeXml(metadata.language)}</dc:language>
    <meta property="dcterms:modified">${formatModified(metadata.modified)}</meta>
  </metadata>
  <manifest>
${manifestItems}
  </manifest>
  <spine toc="ncx">
${spineItems}
  </spine>
</package>
`;
}

/**
 * Render the EPUB 3 navigation document: one list item per chapter, in order.
 */
export function renderNavDocument(metadata: BookMetadata, files: readonly ChapterFile[]): string {
  const items = files.map((file) => `      <li><a href="${file.href}">${escapeXml(file.title)}</a></li>`).join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" xml:lang="${escapeXml(metadata.language)}">
<head>
  <title>Table of Contents</title>
</head>
<body>
  <nav epub:type="toc" id="toc">
    <h1>Table of Contents</h1>
    <ol>
${items}
    </ol>
  </nav>
</body>
</html>
`;
}

/**
 * Render the NCX table of contents for EPUB 2 readers.
 */
export function renderNcx(metadata: BookMetadata, files: readonly ChapterFile[]): string {
  const navPoints = files
    .map(
      (file, index) => `    <navPoint id="navpoint-${index + 1}" playOrder="${index + 1}">
      <navLabel><text>${escapeXml(file.title)}</text></navLabel>
      <content src="${file.href}"/>
    </navPoint>`,
    )
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="${escapeXml(metadata.identifier)}"/>
    <meta name="dtb:depth" content="1"/>
  </head>
  <docTitle><text>${escapeXml(metadata.title)}</text></docTitle>
  <navMap>
${navPoints}
  </navMap>
</ncx>
`;
}

/**
 * Serialize a Book to EPUB bytes.
 * Entry dates are pinned to metadata.modified, so the same Book always
 * produces the same bytes.
 */
export async function renderEpub(book: Book): Promise<Buffer> {
  const { metadata, chapters } = book;
  // Implicit folder entries would carry the current time
  const options = { date: new Date(metadata.modified), createFolders: false };
  const zip = new JSZip();

  // mimetype must be first and uncompressed
  zip.file("mimetype", "application/epub+zip", { ...options, compression: "STORE" });

  zip.file(
    "META-INF/container.xml",
    `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`,
    options,
  );

  const files: ChapterFile[] = chapters.map((chapter, index) => ({
    id: `chapter-${index + 1}`,
    href: chapterFileName(index),
    title: chapter.title,
  }));

  chapters.forEach((chapter, index) => {
    zip.file(`OEBPS/${files[index].href}`, renderChapterXhtml(chapter, metadata.language), options);
  });

  zip.file("OEBPS/styles.css", STYLESHEET, options);
  zip.file("OEBPS/content.opf", renderPackageDocument(metadata, files), options);
  zip.file("OEBPS/nav.xhtml", renderNavDocument(metadata, files), options);
  zip.file("OEBPS/toc.ncx", renderNcx(metadata, files), options);

  return zip.generateAsync({
    type: "nodebuffer",
    mimeType: "application/epub+zip",
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
  });
}

/**
 * Temporary file the archive is written to before being moved into place.
 */
export function tempPathFor(outputPath: string): string {
  return path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.partial`);
}

/**
 * Write a Book to outputPath, replacing any existing file.
 * The archive is rendered fully in memory and moved into place with a
 * rename, so a failed run never leaves a partial EPUB behind.
 *
 * @returns Number of bytes written
 * @throws {WriteError} On any filesystem failure
 */
export async function writeEpub(book: Book, outputPath: string): Promise<number> {
  const data = await renderEpub(book);
  const tempPath = tempPathFor(outputPath);

  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.error(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw new WriteError(`Could not write ${outputPath}: ${errorMessage(error)}`, { url: outputPath, cause: error });
  }

  return data.length;
}
