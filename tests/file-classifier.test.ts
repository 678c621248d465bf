import { describe, expect, test } from "vitest";
import { classifyEntry } from "../src/analyzers/fileClassifier.js";

describe("file classifier", () => {
  test.each([
    "NOTICE",
    "META-INF/NOTICE.txt",
    "META-INF/LICENSE.md",
    "META-INF/LICENCE",
    "license.xml",
    "META-INF/jackson-core-LICENSE",
    "META-INF/maven/org.acme/widget/pom.xml"
  ])("%s is a notice candidate", (name) => {
    expect(classifyEntry(name)).toBe("notice");
  });

  test.each(["META-INF/MANIFEST.MF", "meta-inf/manifest.mf"])("%s is the manifest", (name) => {
    expect(classifyEntry(name)).toBe("metadata");
  });

  test.each([
    "META-INF/LICENSE.html",
    "LICENSE-2.0.txt",
    "NOTICES",
    "mylicense.txt",
    "org/acme/Notice.class",
    "META-INF/maven/org.acme/widget/pom.properties",
    "nested/META-INF/MANIFEST.MF"
  ])("%s is ignored", (name) => {
    expect(classifyEntry(name)).toBe("ignore");
  });
});
