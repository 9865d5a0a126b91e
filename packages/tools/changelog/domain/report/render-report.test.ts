import { test } from "node:test";
import assert from "node:assert/strict";
import { renderReport } from "./render-report.ts";
import { escapeHtml } from "./escape-html.ts";
import type { ChangelogEntry } from "../entities/entry.ts";
import { RenderError } from "../entities/errors.ts";

const login: ChangelogEntry = {
  id: "aaaaa00000000000000000001",
  changeType: "Created",
  description: "add login form",
  timestamp: "2025-01-15T10:00:00+01:00",
};

const header: ChangelogEntry = {
  id: "bbbbb00000000000000000002",
  changeType: "Edited",
  description: "tweak header",
  timestamp: "2025-01-16T09:15:30+01:00",
};

const banner: ChangelogEntry = {
  id: "ccccc00000000000000000003",
  changeType: "Deleted",
  description: "drop banner",
  timestamp: "2025-01-15T10:00:00+01:00",
};

test("escapeHtml - escapes markup characters", () => {
  assert.equal(
    escapeHtml(`<a href="x">Tom & Jerry's</a>`),
    "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;",
  );
});

test("renderReport - empty list renders a complete document", () => {
  const html = renderReport([]);

  assert.ok(html.startsWith("<!DOCTYPE html>\n<html lang=\"en\">"));
  assert.ok(html.endsWith("</body>\n</html>\n"));
  assert.ok(html.includes("<title>Project Changelog</title>"));
  assert.ok(html.includes('<p class="summary">0 entries: 0 created, 0 edited, 0 deleted</p>'));
  assert.ok(html.includes('<p class="empty">No changelog entries yet.</p>'));
  assert.ok(!html.includes('<div class="entry">'));
});

test("renderReport - renders type, description and formatted date", () => {
  const html = renderReport([login]);

  assert.ok(
    html.includes(`<div class="entry">
<span class="tag created">Created</span>
<span class="text">add login form</span>
<time class="date" datetime="2025-01-15T10:00:00+01:00">2025-01-15 10:00:00</time>
</div>`),
  );
  assert.ok(html.includes('<p class="summary">1 entry: 1 created, 0 edited, 0 deleted</p>'));
  assert.ok(!html.includes("No changelog entries yet."));
});

test("renderReport - escapes descriptions", () => {
  const html = renderReport([
    { ...login, description: "<script>alert(1)</script>" },
  ]);

  assert.ok(
    html.includes(
      '<span class="text">&lt;script&gt;alert(1)&lt;/script&gt;</span>',
    ),
  );
  assert.ok(!html.includes("<script>"));
});

test("renderReport - escapes the title", () => {
  const html = renderReport([], { title: "R&D <notes>" });

  assert.ok(html.includes("<title>R&amp;D &lt;notes&gt;</title>"));
  assert.ok(html.includes("<h1>R&amp;D &lt;notes&gt;</h1>"));
});

test("renderReport - newest first, ties keep stored order", () => {
  const html = renderReport([login, header, banner]);

  const order = [header, login, banner].map((entry) =>
    html.indexOf(`<span class="text">${entry.description}</span>`)
  );
  assert.ok(order.every((position) => position > 0));
  assert.deepEqual([...order].sort((a, b) => a - b), order);
});

test("renderReport - is deterministic", () => {
  assert.equal(
    renderReport([login, header, banner]),
    renderReport([login, header, banner]),
  );
});

test("renderReport - counts every change type", () => {
  const html = renderReport([login, header, banner, { ...banner, id: "d" }]);

  assert.ok(html.includes('<p class="summary">4 entries: 1 created, 1 edited, 2 deleted</p>'));
});

test("renderReport - malformed timestamp is a RenderError", () => {
  assert.throws(
    () => renderReport([login, { ...header, timestamp: "last tuesday" }]),
    (e: unknown) =>
      e instanceof RenderError && e.message.startsWith("Malformed entry at position 1"),
  );
});

test("renderReport - empty id is a RenderError", () => {
  assert.throws(() => renderReport([{ ...login, id: "" }]), RenderError);
});
