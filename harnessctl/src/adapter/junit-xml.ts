import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import type { TestCounts } from "../types/phase.js";

type XmlNode = Record<string, unknown>;

function isNode(v: unknown): v is XmlNode {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function nodes(v: unknown): XmlNode[] {
  if (Array.isArray(v)) return v.filter(isNode);
  return isNode(v) ? [v] : [];
}

function intAttr(node: XmlNode, name: string): number {
  const raw = node[`@_${name}`];
  const n = typeof raw === "number" ? raw : Number.parseInt(String(raw ?? "0"), 10);
  return Number.isNaN(n) ? 0 : n;
}

/**
 * Summarize a JUnit XML report (pytest --junitxml and most runners) into test
 * counts. Accepts both a <testsuites> wrapper and a bare <testsuite>.
 */
export function parseJunitCounts(xmlContent: string): TestCounts {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseAttributeValue: false,
    isArray: (name) => name === "testsuite",
  });

  const parsed: unknown = parser.parse(xmlContent);
  if (!isNode(parsed)) return { total: 0, passed: 0, failed: 0, skipped: 0 };

  const wrapper = parsed.testsuites;
  const suites = isNode(wrapper) ? nodes(wrapper.testsuite) : nodes(parsed.testsuite);

  let total = 0;
  let failed = 0;
  let skipped = 0;
  for (const suite of suites) {
    total += intAttr(suite, "tests");
    failed += intAttr(suite, "failures") + intAttr(suite, "errors");
    skipped += intAttr(suite, "skipped");
  }

  return { total, passed: Math.max(0, total - failed - skipped), failed, skipped };
}

export function parseJunitCountsFile(filePath: string): TestCounts {
  return parseJunitCounts(fs.readFileSync(filePath, "utf8"));
}
