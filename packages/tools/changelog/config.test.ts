import { test } from "node:test";
import assert from "node:assert/strict";
import { resolveConfig } from "./config.ts";

test("resolveConfig - defaults", () => {
  assert.deepEqual(resolveConfig({}, {}), {
    changelogPath: "changelog.json",
    reportPath: "changelog.html",
    reportTitle: "Project Changelog",
  });
});

test("resolveConfig - environment overrides defaults", () => {
  const config = resolveConfig({}, {
    CHANGELOG_FILE: "notes/log.json",
    CHANGELOG_REPORT: "public/log.html",
    CHANGELOG_TITLE: "",
  });

  assert.equal(config.changelogPath, "notes/log.json");
  assert.equal(config.reportPath, "public/log.html");
  // Blank variables are ignored
  assert.equal(config.reportTitle, "Project Changelog");
});

test("resolveConfig - flags override environment", () => {
  const config = resolveConfig(
    { file: "a.json", output: "a.html", title: "A" },
    { CHANGELOG_FILE: "b.json", CHANGELOG_REPORT: "b.html" },
  );

  assert.deepEqual(config, {
    changelogPath: "a.json",
    reportPath: "a.html",
    reportTitle: "A",
  });
});

test("resolveConfig - blank flags fall back to environment and defaults", () => {
  const config = resolveConfig(
    { file: "", output: "  ", title: "" },
    { CHANGELOG_FILE: "env.json", CHANGELOG_TITLE: "Env Title" },
  );

  assert.deepEqual(config, {
    changelogPath: "env.json",
    reportPath: "changelog.html",
    reportTitle: "Env Title",
  });
});
