import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "node:path";
import os from "node:os";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { IoError, PathPrefixError } from "../errors";
import { asString, stringValue, ValueMap } from "../value";
import { destinationPath, loadPost, normalizePost } from "./normalize-post";

const postsRoot = path.join(path.sep, "site", "source", "posts");
const options = { postsRoot, baseUrl: "https://example.com" };

function document(frontMatter: ValueMap, body: string) {
  return { frontMatter, body };
}

describe("destinationPath", () => {
  it("strips the posts root and rewrites the extension", () => {
    expect(destinationPath(path.join(postsRoot, "2024", "hello.md"), postsRoot)).toBe(
      "2024/hello.html",
    );
  });

  it("appends .html to files without an extension", () => {
    expect(destinationPath(path.join(postsRoot, "about"), postsRoot)).toBe(
      "about.html",
    );
  });

  it("fails for paths outside the posts root", () => {
    expect(() =>
      destinationPath(path.join(path.sep, "elsewhere", "post.md"), postsRoot),
    ).toThrow(PathPrefixError);
  });
});

describe("normalizePost", () => {
  it("renders Markdown bodies to HTML", () => {
    const post = normalizePost(
      document(new ValueMap(), "# Heading\n\nSome *text*\n"),
      path.join(postsRoot, "hello.md"),
      options,
    );

    const text = asString(post.get("text"));
    expect(text).toContain("<h1>Heading</h1>");
    expect(text).toContain("<p>Some <em>text</em></p>");
  });

  it("passes other bodies through unmodified", () => {
    const post = normalizePost(
      document(new ValueMap(), "<p>*not markdown*</p>\n"),
      path.join(postsRoot, "hello.html"),
      options,
    );

    expect(asString(post.get("text"))).toBe("<p>*not markdown*</p>\n");
  });

  it("inserts path and url", () => {
    const post = normalizePost(
      document(new ValueMap(), ""),
      path.join(postsRoot, "notes", "hello.md"),
      options,
    );

    expect(asString(post.get("path"))).toBe("notes/hello.html");
    expect(asString(post.get("url"))).toBe("https://example.com/notes/hello.html");
  });

  it("derives a missing date from the destination path", () => {
    const post = normalizePost(
      document(new ValueMap(), ""),
      path.join(postsRoot, "2024-06-01-summer.md"),
      options,
    );

    expect(asString(post.get("date"))).toBe("2024-06-01T00:00:00+00:00");
  });

  it("keeps an existing date", () => {
    const post = normalizePost(
      document(new ValueMap([["date", stringValue("2020-01-01T12:00:00Z")]]), ""),
      path.join(postsRoot, "2024-06-01-summer.md"),
      options,
    );

    expect(asString(post.get("date"))).toBe("2020-01-01T12:00:00Z");
  });

  it("leaves date absent when the path has no date prefix", () => {
    const post = normalizePost(
      document(new ValueMap(), ""),
      path.join(postsRoot, "undated.md"),
      options,
    );

    expect(post.has("date")).toBe(false);
  });
});

describe("loadPost", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "inkpost-post-"));
    await mkdir(path.join(root, "posts"), { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads, parses and normalizes a file", async () => {
    const file = path.join(root, "posts", "2024-01-01-new-year.md");
    await writeFile(file, "---\ntitle: New Year\n---\nHello\n");

    const post = await loadPost(file, {
      postsRoot: path.join(root, "posts"),
      baseUrl: "",
    });

    expect(post.keys()).toEqual(["date", "path", "text", "title", "url"]);
    expect(asString(post.get("url"))).toBe("/2024-01-01-new-year.html");
    expect(asString(post.get("text"))).toBe("<p>Hello</p>");
  });

  it("wraps read failures as IoError", async () => {
    await expect(
      loadPost(path.join(root, "posts", "missing.md"), {
        postsRoot: path.join(root, "posts"),
        baseUrl: "",
      }),
    ).rejects.toBeInstanceOf(IoError);
  });
});
