import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import inject from "light-my-request";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { buildApp } from "../src/app.js";
import { loadConfig } from "../src/config.js";
import { createLocalRepositoryResolver, type ArtifactDescriptor } from "../src/lib/artifact.js";
import { createCopyrightExtractor } from "../src/lib/extractor.js";
import { bundledFilterRules } from "../src/lib/filters.js";
import { silentLogger } from "../src/lib/logger.js";
import { buildJar, writeRepositoryJar } from "./helpers/jars.js";

type App = ReturnType<typeof buildApp>;

const widget: ArtifactDescriptor = { groupId: "org.acme", artifactId: "widget", version: "1.0", type: "jar" };

function createApp(repo: string, env: Record<string, string> = {}): App {
  const config = loadConfig({ LOCAL_REPOSITORY: repo, LOG_LEVEL: "none", VERSION: "test", ...env });
  const rules = bundledFilterRules();
  const extractor = createCopyrightExtractor({
    resolver: createLocalRepositoryResolver(config.LOCAL_REPOSITORY),
    rules,
    logger: silentLogger,
    max_entry_bytes: config.INTAKE_MAX_SINGLE_FILE_BYTES
  });
  return buildApp({ config, extractor, rules, logger: silentLogger });
}

describe("api integration", () => {
  let repo: string;
  let app: App;

  beforeAll(() => {
    repo = fs.mkdtempSync(path.join(os.tmpdir(), "attribution-api-"));
    writeRepositoryJar(repo, widget, [["META-INF/MANIFEST.MF", "Manifest-Version: 1.0\nBundle-Vendor: Acme Vendor\n"]]);
    writeRepositoryJar(repo, { ...widget, type: "java-source" }, [["NOTICE.txt", "Copyright 2020 Acme Corp\n"]]);
    app = createApp(repo);
  });

  afterAll(() => {
    fs.rmSync(repo, { recursive: true, force: true });
  });

  test("extracts the attribution of a repository artifact", async () => {
    const res = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright",
      payload: { artifact: { groupId: "org.acme", artifactId: "widget", version: "1.0" } }
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      scan_id: expect.any(String),
      artifact: "org.acme:widget:jar:1.0",
      copyright: "2020 Acme Corp",
      text_copyrights: ["2020 Acme Corp"],
      metadata_copyrights: ["Acme Vendor"],
      archives: [
        { kind: "primary", artifact: "org.acme:widget:jar:1.0", status: "scanned", failed_entries: [] },
        { kind: "sources", artifact: "org.acme:widget:java-source:sources:1.0", status: "scanned", failed_entries: [] }
      ]
    });
  });

  test("unknown artifacts yield a null attribution", async () => {
    const res = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright",
      payload: { artifact: { groupId: "org.acme", artifactId: "gadget", version: "2.0", type: "bundle" } }
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      artifact: "org.acme:gadget:bundle:2.0",
      copyright: null,
      archives: [
        { kind: "primary", artifact: "org.acme:gadget:jar:2.0", status: "unresolved" },
        { kind: "sources", status: "unresolved" }
      ]
    });
  });

  test("rejects malformed artifact requests", async () => {
    const missingVersion = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright",
      payload: { artifact: { groupId: "org.acme", artifactId: "widget" } }
    });
    expect(missingVersion.statusCode).toBe(400);
    expect(missingVersion.body).toMatchObject({ error: { error_code: "BAD_REQUEST" } });

    const traversal = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright",
      payload: { artifact: { groupId: "org.acme", artifactId: "../../etc", version: "1.0" } }
    });
    expect(traversal.statusCode).toBe(400);

    const withFile = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright",
      payload: { artifact: { ...widget, file: "/etc/passwd" } }
    });
    expect(withFile.statusCode).toBe(400);
  });

  test("rejects artifact types that would leave the repository", async () => {
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), "attribution-outside-"));
    try {
      fs.writeFileSync(path.join(outside, "other.jar"), buildJar([["NOTICE", "Copyright 2024 Outside Org\n"]]));
      const escape = path.relative(path.join(repo, "org", "acme", "widget", "1.0"), path.join(outside, "other.jar"));
      const res = await jsonRequest(app, {
        method: "POST",
        url: "/v1/copyright",
        payload: { artifact: { groupId: "org.acme", artifactId: "widget", version: "1.0", type: `/${escape}` } }
      });
      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ error: { error_code: "BAD_REQUEST" } });
    } finally {
      fs.rmSync(outside, { recursive: true, force: true });
    }
  });

  test("scans an uploaded archive", async () => {
    const jar = buildJar([
      ["META-INF/MANIFEST.MF", "Manifest-Version: 1.0\nImplementation-Vendor: Example Org\n"],
      ["META-INF/NOTICE", "## Copyright\nJane Doe and\nthe Widget contributors\n## License\nMIT\n"]
    ]);

    const res = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright/archive",
      payload: { jar_b64: jar.toString("base64") }
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      scan_id: expect.any(String),
      name: "upload.jar",
      copyright: "Jane Doe and the Widget contributors",
      text_copyrights: ["Jane Doe and the Widget contributors"],
      metadata_copyrights: ["Example Org"],
      failed_entries: []
    });
  });

  test("uploaded archives that cannot be read are rejected", async () => {
    const res = await jsonRequest(app, {
      method: "POST",
      url: "/v1/copyright/archive",
      payload: { jar_b64: Buffer.from("not a zip archive", "utf8").toString("base64"), name: "broken.jar" }
    });

    expect(res.statusCode).toBe(422);
    expect(res.body).toMatchObject({ error: { error_code: "ARCHIVE_UNREADABLE" } });
  });

  test("uploaded archives above the size limit are rejected", async () => {
    const small = createApp(repo, { INTAKE_MAX_ARCHIVE_BYTES: "16" });
    const jar = buildJar([["NOTICE", "Copyright 2020 Acme Corp"]]);

    const res = await jsonRequest(small, {
      method: "POST",
      url: "/v1/copyright/archive",
      payload: { jar_b64: jar.toString("base64") }
    });

    expect(res.statusCode).toBe(413);
    expect(res.body).toEqual({ error: { error_code: "ARCHIVE_TOO_LARGE", message: "archive exceeds size limit" } });
  });

  test("lists filters and version", async () => {
    const filters = await jsonRequest(app, { method: "GET", url: "/v1/filters" });
    expect(filters.statusCode).toBe(200);
    expect(filters.body).toMatchObject({ count: bundledFilterRules().patterns.length });

    const version = await jsonRequest(app, { method: "GET", url: "/v1/version" });
    expect(version.body).toEqual({ version: "test", filter_count: bundledFilterRules().patterns.length });
  });

  test("serves health and the openapi document", async () => {
    const health = await jsonRequest(app, { method: "GET", url: "/healthz" });
    expect(health.body).toEqual({ ok: true });

    const openapi = await jsonRequest(app, { method: "GET", url: "/openapi.json" });
    expect(openapi.statusCode).toBe(200);
    expect(openapi.body).toMatchObject({ openapi: "3.0.3", info: { title: "Attribution Extractor API" } });
  });
});

async function jsonRequest(
  app: App,
  args: {
    method: "GET" | "POST";
    url: string;
    payload?: unknown;
  }
): Promise<{ statusCode: number; body: unknown }> {
  const headers: Record<string, string> = {};

  let payload: string | undefined;
  if (args.payload !== undefined) {
    headers["content-type"] = "application/json";
    payload = JSON.stringify(args.payload);
  }

  const res = await inject(app, {
    method: args.method,
    url: args.url,
    headers,
    payload
  });

  return {
    statusCode: res.statusCode,
    body: res.payload.length ? res.json() : {}
  };
}
