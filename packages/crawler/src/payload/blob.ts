import * as cheerio from "cheerio";
import { BlobNotFoundError, ShapeError } from "../errors.js";
import { isRecord } from "./nested.js";

/**
 * Where an embedded JSON blob lives in a document
 */
export type BlobAnchor =
  /** Content of <script id="..."> */
  | { kind: "scriptId"; id: string }
  /** Object or array literal assigned to an expression, e.g. `SKB.pageContent = {...};` */
  | { kind: "assignment"; target: string }
  /** Value of a top-level key of a JSON document */
  | { kind: "jsonKey"; key: string };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Returns the balanced {...} or [...] literal starting at `start`.
 * Brackets inside quoted strings are ignored.
 */
function sliceBalanced(text: string, start: number): string | undefined {
  const stack: string[] = [];
  let quote: string | undefined;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{" || ch === "[") {
      stack.push(ch === "{" ? "}" : "]");
    } else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return undefined;
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

function extractScript(document: string, id: string): string {
  const $ = cheerio.load(document);
  const script = $("script")
    .toArray()
    .find((el) => el.attribs.id === id);
  if (!script) {
    throw new BlobNotFoundError(`<script id="${id}"> not found`);
  }
  const content = $(script).text().trim();
  if (content === "") {
    throw new BlobNotFoundError(`<script id="${id}"> is empty`);
  }
  return content;
}

function extractAssignment(document: string, target: string): string {
  const match = new RegExp(`${escapeRegExp(target)}\\s*=\\s*(?=[{[])`).exec(document);
  if (!match) {
    throw new BlobNotFoundError(`assignment to ${target} not found`);
  }
  const literal = sliceBalanced(document, match.index + match[0].length);
  if (literal === undefined) {
    throw new ShapeError(`unterminated literal assigned to ${target}`);
  }
  return literal;
}

function extractJsonKey(document: string, key: string): string {
  const root = parseBlob(document);
  if (!isRecord(root) || !(key in root)) {
    throw new BlobNotFoundError(`top-level key "${key}" not found`);
  }
  const value = root[key];
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Cuts an embedded data region out of a document. A missing anchor is a
 * BlobNotFoundError; there is no partial recovery.
 */
export function extractBlob(document: string, anchor: BlobAnchor): string {
  switch (anchor.kind) {
    case "scriptId":
      return extractScript(document, anchor.id);
    case "assignment":
      return extractAssignment(document, anchor.target);
    case "jsonKey":
      return extractJsonKey(document, anchor.key);
  }
}

/**
 * JSON.parse that reports failures as ShapeError
 */
export function parseBlob(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ShapeError("blob is not valid JSON", { cause: error });
  }
}
