import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AssemblyError, ExtractError, FetchError, ParseError } from "./errors.js";
import { buildMetadata, latestPublished, type PipelineOptions, type PipelineState, runPipeline, toPipelineError } from "./pipeline.js";
import { createMemoryFetcher, createMemoryLogger } from "./test-helpers.js";

const FEED_URL = "https://example.gmi/feed";

const SIMPLE_SITE = {
  [FEED_URL]: "# example feed\n\n=> /p1.gmi Entry 1\n=> /p2.gmi Entry 2\n",
  "https://example.gmi/p1.gmi": "Hello world",
  "https://example.gmi/p2.gmi": "Goodbye",
};

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function makeOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    feedUrl: FEED_URL,
    outputPath: path.join(dir, "book.epub"),
    language: "en",
    maxPages: 1,
    skipUrls: [],
    urlPattern: null,
    chapterDelay: 0,
    extract: {},
    now: () => new Date("2024-05-01T00:00:00Z"),
    ...overrides,
  };
}

describe("runPipeline", () => {
  it("turns a feed into a book with one chapter per entry", async () => {
    const states: PipelineState[] = [];
    const result = await runPipeline(makeOptions({ onTransition: (state) => states.push(state) }), {
      fetcher: createMemoryFetcher(SIMPLE_SITE),
      logger: createMemoryLogger(),
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.book.metadata).toEqual({
      title: "example feed",
      language: "en",
      identifier: expect.stringMatching(/^urn:uuid:/),
      modified: "2024-05-01T00:00:00.000Z",
    });
    expect(result.book.chapters).toEqual([
      { title: "Entry 1", body: "Hello world", url: "https://example.gmi/p1.gmi" },
      { title: "Entry 2", body: "Goodbye", url: "https://example.gmi/p2.gmi" },
    ]);
    expect((await fs.stat(result.outputPath)).size).toBe(result.bytes);
    expect(states).toEqual([
      "start",
      "feed-fetched",
      "entries-parsed",
      "fetching",
      "extracted",
      "fetching",
      "extracted",
      "assembled",
      "written",
      "done",
    ]);
  });

  it("applies title and author overrides", async () => {
    const result = await runPipeline(makeOptions({ title: "My Book", author: "Jane Doe" }), {
      fetcher: createMemoryFetcher(SIMPLE_SITE),
      logger: createMemoryLogger(),
    });

    expect(result.ok && result.book.metadata).toMatchObject({ title: "My Book", author: "Jane Doe" });
  });

  it("writes identical files for identical runs", async () => {
    const first = path.join(dir, "first.epub");
    const second = path.join(dir, "second.epub");

    await runPipeline(makeOptions({ outputPath: first }), { fetcher: createMemoryFetcher(SIMPLE_SITE), logger: createMemoryLogger() });
    await runPipeline(makeOptions({ outputPath: second }), { fetcher: createMemoryFetcher(SIMPLE_SITE), logger: createMemoryLogger() });

    expect((await fs.readFile(first)).equals(await fs.readFile(second))).toBe(true);
  });

  it("fails with an AssemblyError and writes nothing when the feed has no entries", async () => {
    const result = await runPipeline(makeOptions(), {
      fetcher: createMemoryFetcher({ [FEED_URL]: "# Empty feed\n" }),
      logger: createMemoryLogger(),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(AssemblyError);
    expect(result.failedAt).toBe("entries-parsed");
    expect(result.step).toBe("Assembling book");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("stops at the first failing chapter and writes nothing", async () => {
    const fetcher = createMemoryFetcher({
      [FEED_URL]: "# example feed\n=> /p1.gmi Entry 1\n=> /p2.gmi Entry 2\n=> /p3.gmi Entry 3\n",
      "https://example.gmi/p1.gmi": "Hello world",
      "https://example.gmi/p3.gmi": "Never fetched",
    });

    const result = await runPipeline(makeOptions(), { fetcher, logger: createMemoryLogger() });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.failedAt).toBe("fetching");
    expect(result.step).toBe("Fetching chapter 2/3 (https://example.gmi/p2.gmi)");
    expect(fetcher.requests).toEqual([FEED_URL, "https://example.gmi/p1.gmi", "https://example.gmi/p2.gmi"]);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("reports an unreachable feed", async () => {
    const result = await runPipeline(makeOptions(), { fetcher: createMemoryFetcher({}), logger: createMemoryLogger() });

    expect(result).toMatchObject({ ok: false, failedAt: "start", step: `Fetching feed ${FEED_URL}` });
    expect(!result.ok && result.error.kind).toBe("fetch");
  });

  it("rejects a feed that is not text", async () => {
    const result = await runPipeline(makeOptions(), {
      fetcher: createMemoryFetcher({ [FEED_URL]: { body: new Uint8Array([1, 2, 3]), mimeType: "image/png" } }),
      logger: createMemoryLogger(),
    });

    expect(result).toMatchObject({ ok: false, failedAt: "feed-fetched" });
    expect(!result.ok && result.error).toBeInstanceOf(ParseError);
  });

  it("rejects a chapter page without text", async () => {
    const result = await runPipeline(makeOptions(), {
      fetcher: createMemoryFetcher({ ...SIMPLE_SITE, "https://example.gmi/p2.gmi": "\n\n" }),
      logger: createMemoryLogger(),
    });

    expect(!result.ok && result.error).toBeInstanceOf(ExtractError);
  });

  it("follows older-posts links up to the page limit", async () => {
    const site = {
      "gemini://example.org/gemlog/": "# Gemlog\n=> new.gmi 2024-02-01 New\n=> page2.gmi Older posts\n",
      "gemini://example.org/gemlog/page2.gmi": "# Gemlog, page 2\n=> old.gmi 2023-12-24 Old\n=> ./ Older posts\n",
      "gemini://example.org/gemlog/new.gmi": "New text",
      "gemini://example.org/gemlog/old.gmi": "Old text",
    };

    const onePage = await runPipeline(makeOptions({ feedUrl: "gemini://example.org/gemlog/" }), {
      fetcher: createMemoryFetcher(site),
      logger: createMemoryLogger(),
    });
    const fetcher = createMemoryFetcher(site);
    const allPages = await runPipeline(
      makeOptions({ feedUrl: "gemini://example.org/gemlog/", maxPages: 5, outputPath: path.join(dir, "all.epub") }),
      { fetcher, logger: createMemoryLogger() },
    );

    expect(onePage.ok && onePage.book.chapters.map((chapter) => chapter.title)).toEqual(["New"]);
    expect(allPages.ok && allPages.book.chapters.map((chapter) => chapter.title)).toEqual(["New", "Old"]);
    expect(allPages.ok && allPages.book.metadata.title).toBe("Gemlog");
    expect(allPages.ok && allPages.book.metadata.modified).toBe("2024-02-01T00:00:00.000Z");
    expect(fetcher.requests.slice(0, 2)).toEqual(["gemini://example.org/gemlog/", "gemini://example.org/gemlog/page2.gmi"]);
  });

  it("filters entries before fetching", async () => {
    const fetcher = createMemoryFetcher(SIMPLE_SITE);
    const logger = createMemoryLogger();

    const result = await runPipeline(makeOptions({ skipUrls: ["p2.gmi"] }), { fetcher, logger });

    expect(result.ok && result.book.chapters.map((chapter) => chapter.title)).toEqual(["Entry 1"]);
    expect(fetcher.requests).not.toContain("https://example.gmi/p2.gmi");
    expect(logger.lines).toContain("info: Filtered 1 entries (2 → 1)");
  });
});

describe("latestPublished", () => {
  it("returns the newest date", () => {
    expect(
      latestPublished([
        { title: "a", url: "gemini://example.org/a", order: 0, published: "2024-01-02" },
        { title: "b", url: "gemini://example.org/b", order: 1, published: "2024-03-04" },
        { title: "c", url: "gemini://example.org/c", order: 2 },
      ]),
    ).toBe("2024-03-04T00:00:00.000Z");
  });

  it("returns undefined without dates", () => {
    expect(latestPublished([{ title: "a", url: "gemini://example.org/a", order: 0 }])).toBeUndefined();
  });
});

describe("buildMetadata", () => {
  it("falls back to the feed host for the title", () => {
    const metadata = buildMetadata(makeOptions(), { entries: [] }, []);

    expect(metadata.title).toBe("example.gmi");
    expect(metadata.author).toBeUndefined();
    expect(metadata.modified).toBe("2024-05-01T00:00:00.000Z");
  });

  it("takes the author from the feed", () => {
    expect(buildMetadata(makeOptions(), { title: "Log", author: "Ed", entries: [] }, []).author).toBe("Ed");
  });
});

describe("toPipelineError", () => {
  it("keeps pipeline errors as they are", () => {
    const error = new ParseError("bad feed");
    expect(toPipelineError(error, "fetching")).toBe(error);
  });

  it("categorizes other errors by state", () => {
    expect(toPipelineError(new Error("x"), "start")).toBeInstanceOf(FetchError);
    expect(toPipelineError(new Error("x"), "feed-fetched")).toBeInstanceOf(ParseError);
    expect(toPipelineError(new Error("x"), "fetching")).toBeInstanceOf(ExtractError);
  });
});
