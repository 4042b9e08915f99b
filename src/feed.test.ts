import { describe, expect, it } from "vitest";
import { ParseError } from "./errors.js";
import { authorName, filterEntries, isValidDate, parseFeed, parseGemfeed, renumberEntries } from "./feed.js";
import type { FeedEntry } from "./types.js";

const GEMLOG = `# My Gemlog
## Thoughts and notes

=> gemini://example.org/ Home
=> 2024-02-01-second.gmi 2024-02-01 - Second post
=> 2024-01-15-first.gmi 2024-01-15 First post
=> page2.gmi Older posts
`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Gemlog</title>
  <author><name>Jane Doe</name></author>
  <id>gemini://example.org/gemlog/</id>
  <updated>2024-02-01T00:00:00Z</updated>
  <entry>
    <title>Second post</title>
    <link href="gemini://example.org/gemlog/second.gmi"/>
    <id>gemini://example.org/gemlog/second.gmi</id>
    <updated>2024-02-01T00:00:00Z</updated>
  </entry>
  <entry>
    <title>First post</title>
    <link href="first.gmi"/>
    <id>gemini://example.org/gemlog/first.gmi</id>
    <updated>2024-01-15T00:00:00Z</updated>
  </entry>
</feed>
`;

const RSS = `<?xml version="1.0"?>
<rss version="2.0">
  <channel>
    <title>Example Blog</title>
    <link>https://example.com/</link>
    <description>Posts</description>
    <managingEditor>editor@example.com (Ed)</managingEditor>
    <item>
      <title>Post A</title>
      <link>https://example.com/a</link>
    </item>
    <item>
      <link>/b</link>
    </item>
    <item>
      <title>No link</title>
    </item>
  </channel>
</rss>
`;

describe("parseGemfeed", () => {
  it("parses a plain link list with relative links", () => {
    const feed = parseGemfeed("# example feed\n\n=> /p1.gmi Entry 1\n=> /p2.gmi Entry 2\n", "https://example.gmi/feed");

    expect(feed).toEqual({
      title: "example feed",
      entries: [
        { title: "Entry 1", url: "https://example.gmi/p1.gmi", order: 0 },
        { title: "Entry 2", url: "https://example.gmi/p2.gmi", order: 1 },
      ],
      nextPageUrl: undefined,
    });
  });

  it("keeps only dated links in a gemfeed and finds the next page", () => {
    const feed = parseGemfeed(GEMLOG, "gemini://example.org/gemlog/");

    expect(feed.title).toBe("My Gemlog");
    expect(feed.entries).toEqual([
      {
        title: "Second post",
        url: "gemini://example.org/gemlog/2024-02-01-second.gmi",
        order: 0,
        published: "2024-02-01",
      },
      {
        title: "First post",
        url: "gemini://example.org/gemlog/2024-01-15-first.gmi",
        order: 1,
        published: "2024-01-15",
      },
    ]);
    expect(feed.nextPageUrl).toBe("gemini://example.org/gemlog/page2.gmi");
  });

  it("accepts a colon separator and falls back to the date as title", () => {
    const feed = parseGemfeed("=> a.gmi 2024-03-01: Colon title\n=> b.gmi 2024-03-02\n", "gemini://example.org/");

    expect(feed.entries.map((entry) => entry.title)).toEqual(["Colon title", "2024-03-02"]);
  });

  it("treats impossible dates as undated", () => {
    const feed = parseGemfeed("=> a.gmi 2023-02-30 Not a date\n", "gemini://example.org/");

    expect(feed.entries).toEqual([{ title: "2023-02-30 Not a date", url: "gemini://example.org/a.gmi", order: 0 }]);
  });

  it("skips malformed and unsupported links without failing", () => {
    const feed = parseGemfeed(
      [
        "# Links",
        "=> http://[invalid Broken",
        "=> mailto:me@example.org Email",
        "=> ftp://example.org/file Old school",
        "=> /ok.gmi Fine",
      ].join("\n"),
      "gemini://example.org/",
    );

    expect(feed.entries).toEqual([{ title: "Fine", url: "gemini://example.org/ok.gmi", order: 0 }]);
  });

  it("uses the URL as title for unlabeled links", () => {
    const feed = parseGemfeed("=> /bare.gmi\n", "gemini://example.org/");

    expect(feed.entries[0].title).toBe("/bare.gmi");
  });

  it("ignores links inside preformatted blocks", () => {
    const feed = parseGemfeed("# Feed\n```\n=> /fake.gmi Fake\n```\n=> /real.gmi Real\n", "gemini://example.org/");

    expect(feed.entries.map((entry) => entry.title)).toEqual(["Real"]);
  });

  it("returns no entries for a heading-only feed", () => {
    expect(parseGemfeed("# Nothing yet\n", "gemini://example.org/").entries).toEqual([]);
  });

  it("throws ParseError for empty documents", () => {
    expect(() => parseGemfeed("  \n\n", "gemini://example.org/")).toThrow(ParseError);
  });

  it("throws ParseError for documents with no heading and no links", () => {
    expect(() => parseGemfeed("just some words\nand more words", "gemini://example.org/")).toThrow(
      "Document is not a feed: no heading and no links found",
    );
  });
});

describe("parseFeed", () => {
  it("parses Atom feeds", async () => {
    const feed = await parseFeed(ATOM, "gemini://example.org/gemlog/atom.xml");

    expect(feed.title).toBe("Example Gemlog");
    expect(feed.author).toBe("Jane Doe");
    expect(feed.entries).toHaveLength(2);
    expect(feed.entries[0]).toMatchObject({
      title: "Second post",
      url: "gemini://example.org/gemlog/second.gmi",
      order: 0,
    });
    expect(feed.entries[1]).toMatchObject({
      title: "First post",
      url: "gemini://example.org/gemlog/first.gmi",
      order: 1,
    });
  });

  it("parses RSS feeds, skipping items without links", async () => {
    const feed = await parseFeed(RSS, "https://example.com/feed.xml");

    expect(feed.title).toBe("Example Blog");
    expect(feed.author).toBe("editor@example.com (Ed)");
    expect(feed.entries.map(({ title, url, order }) => ({ title, url, order }))).toEqual([
      { title: "Post A", url: "https://example.com/a", order: 0 },
      { title: "https://example.com/b", url: "https://example.com/b", order: 1 },
    ]);
  });

  it("throws ParseError for XML that is not a feed", async () => {
    await expect(parseFeed("<html><body>not a feed</body></html>", "https://example.com/")).rejects.toBeInstanceOf(
      ParseError,
    );
  });

  it("parses gemtext when the document does not start with markup", async () => {
    const feed = await parseFeed("# Log\n=> /a.gmi A\n", "gemini://example.org/");

    expect(feed.entries).toEqual([{ title: "A", url: "gemini://example.org/a.gmi", order: 0 }]);
  });
});

describe("authorName", () => {
  it("reads the shapes xml2js produces", () => {
    expect(authorName("  Ed  ")).toBe("Ed");
    expect(authorName([{ name: ["Jane Doe"] }])).toBe("Jane Doe");
    expect(authorName({ _: "Text node", $: { type: "text" } })).toBe("Text node");
  });

  it("returns undefined for missing or empty values", () => {
    expect(authorName(undefined)).toBeUndefined();
    expect(authorName([])).toBeUndefined();
    expect(authorName({ email: ["x@example.org"] })).toBeUndefined();
    expect(authorName("   ")).toBeUndefined();
  });
});

describe("isValidDate", () => {
  it("accepts real dates only", () => {
    expect(isValidDate("2024-02-29")).toBe(true);
    expect(isValidDate("2023-02-29")).toBe(false);
    expect(isValidDate("2024-13-01")).toBe(false);
  });
});

describe("filterEntries", () => {
  const entries: FeedEntry[] = [
    { title: "A", url: "gemini://example.org/gemlog/2024-a.gmi", order: 0 },
    { title: "B", url: "gemini://example.org/drafts/b.gmi", order: 1 },
    { title: "C", url: "gemini://example.org/gemlog/2023-c.gmi", order: 2 },
  ];

  it("returns all entries when no filters are given", () => {
    expect(filterEntries(entries, [], null)).toEqual(entries);
  });

  it("skips URLs containing a skip string and renumbers", () => {
    expect(filterEntries(entries, ["/drafts/"], null)).toEqual([
      { title: "A", url: "gemini://example.org/gemlog/2024-a.gmi", order: 0 },
      { title: "C", url: "gemini://example.org/gemlog/2023-c.gmi", order: 1 },
    ]);
  });

  it("keeps only URLs matching the pattern", () => {
    expect(filterEntries(entries, [], "**/2024-*.gmi").map((entry) => entry.title)).toEqual(["A"]);
  });
});

describe("renumberEntries", () => {
  it("assigns consecutive orders", () => {
    const renumbered = renumberEntries([
      { title: "A", url: "gemini://example.org/a", order: 5 },
      { title: "B", url: "gemini://example.org/b", order: 0 },
    ]);

    expect(renumbered.map((entry) => entry.order)).toEqual([0, 1]);
  });
});
