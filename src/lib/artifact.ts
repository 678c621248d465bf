import fs from "node:fs";
import path from "node:path";
import { failure, type Failure } from "./errors.js";

export type ArtifactDescriptor = {
  groupId: string;
  artifactId: string;
  version: string;
  /** Artifact type, e.g. "jar", "bundle", "java-source", "pom". */
  type: string;
  classifier?: string;
  scope?: string;
  /** Packaging of the project that produced the artifact; "pom" marks an aggregator/parent. */
  packaging?: string;
  /** Set when the artifact is already resolved to a local file. */
  file?: string;
};

export type ResolveResult = { ok: true; file: string } | Failure;

export interface ArtifactResolver {
  resolve: (artifact: ArtifactDescriptor) => ResolveResult;
}

type ArtifactHandler = { extension: string; classifier?: string };

const HANDLERS: Record<string, ArtifactHandler> = {
  jar: { extension: "jar" },
  bundle: { extension: "jar" },
  "maven-plugin": { extension: "jar" },
  ejb: { extension: "jar" },
  "java-source": { extension: "jar", classifier: "sources" },
  "test-jar": { extension: "jar", classifier: "tests" },
  javadoc: { extension: "jar", classifier: "javadoc" },
  pom: { extension: "pom" },
  war: { extension: "war" },
  ear: { extension: "ear" }
};

export function artifactHandler(type: string): ArtifactHandler {
  return HANDLERS[type] ?? { extension: type };
}

/** Same coordinates, different type. The type's own classifier applies unless one is set explicitly. */
export function siblingOf(artifact: ArtifactDescriptor, type: string): ArtifactDescriptor {
  return {
    groupId: artifact.groupId,
    artifactId: artifact.artifactId,
    version: artifact.version,
    type,
    classifier: artifact.classifier,
    scope: artifact.scope,
    packaging: artifact.packaging
  };
}

export function effectiveClassifier(artifact: ArtifactDescriptor): string | undefined {
  return artifact.classifier || artifactHandler(artifact.type).classifier;
}

export function formatArtifact(artifact: ArtifactDescriptor): string {
  const classifier = effectiveClassifier(artifact);
  const parts = [artifact.groupId, artifact.artifactId, artifact.type];
  if (classifier) parts.push(classifier);
  parts.push(artifact.version);
  if (artifact.scope) parts.push(artifact.scope);
  return parts.join(":");
}

/** Relative path of an artifact inside a repository laid out as group/artifact/version/. */
export function repositoryPath(artifact: ArtifactDescriptor): string {
  const classifier = effectiveClassifier(artifact);
  const fileName = `${artifact.artifactId}-${artifact.version}${classifier ? `-${classifier}` : ""}.${artifactHandler(artifact.type).extension}`;
  return path.join(...artifact.groupId.split("."), artifact.artifactId, artifact.version, fileName);
}

/** Letters, digits, dot, underscore and hyphen; no ".." anywhere. */
export function isSafeCoordinate(segment: string): boolean {
  return /^[A-Za-z0-9._-]+$/.test(segment) && !segment.includes("..");
}

export function createLocalRepositoryResolver(root: string): ArtifactResolver {
  const base = path.resolve(root);
  return {
    resolve: (artifact) => {
      if (artifact.file) return { ok: true, file: artifact.file };
      const segments = [artifact.groupId, artifact.artifactId, artifact.version, artifact.type];
      if (artifact.classifier) segments.push(artifact.classifier);
      if (!segments.every(isSafeCoordinate)) {
        return failure(`Invalid coordinates: ${formatArtifact(artifact)}`);
      }
      const file = path.join(base, repositoryPath(artifact));
      const relative = path.relative(base, file);
      if (relative.startsWith("..") || path.isAbsolute(relative)) {
        return failure(`Invalid coordinates: ${formatArtifact(artifact)}`);
      }
      if (!fs.existsSync(file)) {
        return failure(`Artifact ${formatArtifact(artifact)} not found in ${root}`);
      }
      return { ok: true, file };
    }
  };
}
