import { join } from "path";

import { fileExists } from "../../utils/fs.js";
import { invoke, notPresent, verdictOf } from "./verdict.js";
import type { Validator } from "./types.js";

export const javascriptValidator: Validator = {
  name: "javascript",
  timeoutSeconds: 120,
  async validate(ctx) {
    if (!(await fileExists(join(ctx.workspace, "package.json")))) {
      return notPresent("JavaScript");
    }
    return verdictOf(await invoke(ctx, "npm", ["test"]), "npm test", "npm test passed");
  },
};
