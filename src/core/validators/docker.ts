import { join } from "path";

import { fileExists } from "../../utils/fs.js";
import { invoke, notPresent, verdictOf } from "./verdict.js";
import type { Validator } from "./types.js";

export const VALIDATION_IMAGE_TAG = "autoremedy-validator:latest";

export const dockerBuildValidator: Validator = {
  name: "docker-build",
  timeoutSeconds: 180,
  async validate(ctx) {
    if (!(await fileExists(join(ctx.workspace, "Dockerfile")))) {
      return notPresent("Docker");
    }
    return verdictOf(
      await invoke(ctx, "docker", ["build", "-f", "Dockerfile", "-t", VALIDATION_IMAGE_TAG, ctx.workspace]),
      "docker build",
      "Docker image builds"
    );
  },
};
