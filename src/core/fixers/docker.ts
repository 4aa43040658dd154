import { join } from "path";

import { emptyOutcome } from "../findings/finding.js";
import { fileExists } from "../../utils/fs.js";
import { writeFileAtomicNoFollow } from "../../utils/safe-write.js";
import type { Fixer } from "./types.js";

export const containerFixer: Fixer = {
  name: "container",
  categories: ["docker"],
  async apply(findings, ctx) {
    const outcome = emptyOutcome();
    const wanted = findings.some(
      (f) => f.remedy?.kind === "action" && f.remedy.action === "create-dockerignore"
    );
    if (!wanted) {
      return outcome;
    }

    const target = join(ctx.workspace, ".dockerignore");
    if (await fileExists(target)) {
      ctx.reporter.fixSkipped("docker", ".dockerignore already exists");
      return outcome;
    }

    await writeFileAtomicNoFollow(target, `${ctx.config.docker.ignoreEntries.join("\n")}\n`);
    outcome.fixedCount += 1;
    ctx.reporter.fixApplied("docker", "Created .dockerignore");
    return outcome;
  },
};
