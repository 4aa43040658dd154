import { COMPOSE_FILES } from "../detectors/compose.js";
import { findFirstFile } from "../../utils/fs.js";
import { invoke, notPresent, verdictOf } from "./verdict.js";
import type { Validator } from "./types.js";

export const composeValidator: Validator = {
  name: "compose",
  timeoutSeconds: 30,
  async validate(ctx) {
    const file = await findFirstFile(ctx.workspace, COMPOSE_FILES);
    if (file === null) {
      return notPresent("Docker Compose");
    }
    return verdictOf(
      await invoke(ctx, "docker", ["compose", "-f", file, "config", "--quiet"]),
      "docker compose config",
      `${file} is valid`
    );
  },
};
