import { join } from "path";
import { isMap, isScalar, parseDocument } from "yaml";

import { COMPOSE_FILES, declaresImage } from "../detectors/compose.js";
import { emptyOutcome } from "../findings/finding.js";
import { findFirstFile, readWorkspaceFile } from "../../utils/fs.js";
import { writeFileAtomicNoFollow } from "../../utils/safe-write.js";
import type { Fixer } from "./types.js";

/**
 * Adds `healthcheck` to every service with an image and none of its own.
 * Comments and key order in the rest of the file survive the rewrite.
 */
export function addHealthchecks(
  content: string,
  healthcheck: Record<string, unknown>
): { content: string; services: string[] } {
  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw new Error(`Compose file is not valid YAML: ${doc.errors[0]?.message ?? "parse error"}`);
  }

  const services = doc.get("services", true);
  const updated: string[] = [];
  if (isMap(services)) {
    for (const pair of services.items) {
      const service = pair.value;
      if (!isMap(service) || !declaresImage(service.get("image")) || service.has("healthcheck")) {
        continue;
      }
      service.set("healthcheck", doc.createNode(healthcheck));
      updated.push(isScalar(pair.key) ? String(pair.key.value) : String(pair.key));
    }
  }

  return { content: updated.length > 0 ? doc.toString() : content, services: updated };
}

export const configFixer: Fixer = {
  name: "config",
  categories: ["docker-compose"],
  async apply(findings, ctx) {
    const outcome = emptyOutcome();
    const wanted = findings.some(
      (f) => f.remedy?.kind === "action" && f.remedy.action === "add-compose-healthchecks"
    );
    if (!wanted) {
      return outcome;
    }

    const file = await findFirstFile(ctx.workspace, COMPOSE_FILES);
    const content = file === null ? null : await readWorkspaceFile(ctx.workspace, file);
    if (file === null || content === null) {
      outcome.errors.push({ category: "docker-compose", message: "Compose file no longer exists" });
      return outcome;
    }

    const result = addHealthchecks(content, { ...ctx.config.docker.healthcheck });
    if (result.services.length === 0) {
      ctx.reporter.fixSkipped("docker-compose", "Every service already has a healthcheck");
      return outcome;
    }

    await writeFileAtomicNoFollow(join(ctx.workspace, file), result.content);
    outcome.fixedCount += 1;
    ctx.reporter.fixApplied(
      "docker-compose",
      `Added healthchecks to ${file}: ${result.services.join(", ")}`
    );
    return outcome;
  },
};
