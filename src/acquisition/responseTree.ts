import jsonc from "jsonc-parser";
import type { Node as JsonNode, ParseError } from "jsonc-parser";
import { z } from "zod";

import { NoUrlError } from "../errors.js";

/** Generic JSON document of unknown, service-defined shape. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const STRICT_JSON = { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false } as const;

/**
 * Parses a response body into a {@link JsonValue}. Bodies that are not JSON
 * (plain text identifiers, HTML error pages) yield `null`.
 */
export function parseResponseDocument(body: string): JsonValue | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = jsonValueSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function isJsonObject(value: JsonValue | null | undefined): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse tree keeping document order and the raw text span of every value. */
function parseSyntaxTree(body: string): JsonNode | null {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(body, errors, STRICT_JSON);
  return root !== undefined && errors.length === 0 ? root : null;
}

function childAt(node: JsonNode, segment: string): JsonNode | undefined {
  if (node.type === "array") {
    return /^\d+$/.test(segment) ? node.children?.[Number(segment)] : undefined;
  }
  if (node.type !== "object") {
    return undefined;
  }
  // Duplicate keys resolve to the last occurrence.
  let match: JsonNode | undefined;
  for (const property of node.children ?? []) {
    const [key, value] = property.children ?? [];
    if (key?.value === segment) {
      match = value;
    }
  }
  return match;
}

/**
 * Resolves a JSON pointer (`/data/jobId`) against a parse tree. Returns
 * `undefined` when any segment is missing. `~1` and `~0` escapes are honoured.
 */
function nodeAtPointer(root: JsonNode, pointer: string): JsonNode | undefined {
  let current: JsonNode | undefined = root;
  for (const rawSegment of pointer.split("/").slice(1)) {
    if (current === undefined) {
      return undefined;
    }
    current = childAt(current, rawSegment.replace(/~1/g, "/").replace(/~0/g, "~"));
  }
  return current;
}

/**
 * Returns the first pointer value of `body` that is a non-empty string or a
 * number. Numbers are returned as written in the body so large identifiers
 * keep every digit. `null`, booleans, objects and arrays are treated as absent.
 */
export function firstScalarAt(body: string, pointers: readonly string[]): string | null {
  const root = parseSyntaxTree(body);
  if (root === null) {
    return null;
  }
  for (const pointer of pointers) {
    const node = nodeAtPointer(root, pointer);
    if (node?.type === "string" && typeof node.value === "string" && node.value.length > 0) {
      return node.value;
    }
    if (node?.type === "number") {
      return body.slice(node.offset, node.offset + node.length);
    }
  }
  return null;
}

const ABSOLUTE_URL = /^https?:\/\//i;

/** File-name pattern of a CAR bundle inside a URL. */
const CAR_URL = /\.car($|[?&]|[^A-Za-z0-9._-])/i;

/**
 * Collects every absolute http(s) string value of a JSON body in the order it
 * appears in the text. Object keys are not values; bodies that are not JSON
 * carry no URL.
 */
export function collectUrls(body: string): string[] {
  const root = parseSyntaxTree(body);
  const urls: string[] = [];
  const visit = (node: JsonNode): void => {
    switch (node.type) {
      case "string":
        if (typeof node.value === "string" && ABSOLUTE_URL.test(node.value)) {
          urls.push(node.value);
        }
        return;
      case "property": {
        const value = node.children?.[1];
        if (value !== undefined) {
          visit(value);
        }
        return;
      }
      default:
        node.children?.forEach(visit);
    }
  };
  if (root !== null) {
    visit(root);
  }
  return urls;
}

export function isCarUrl(url: string): boolean {
  return CAR_URL.test(url);
}

/**
 * Picks the download URL out of a response: the first URL naming a `.car`
 * file, otherwise the first URL. Throws {@link NoUrlError} when there is none.
 */
export function extractPreferredUrl(body: string): string {
  const urls = collectUrls(body);
  const car = urls.find(isCarUrl);
  if (car !== undefined) {
    return car;
  }
  const first = urls[0];
  if (first === undefined) {
    throw new NoUrlError();
  }
  return first;
}
