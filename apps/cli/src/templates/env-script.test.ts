import { describe, expect, it } from "vitest";
import { renderEnvScript } from "./env-script.ts";

describe("renderEnvScript", () => {
  it("exports each variable double-quoted, in order", () => {
    expect(
      renderEnvScript({
        EPOCHS: "3",
        DATA_DIR: "$HOME/data",
        GREETING: 'say "hi" `now`',
      }),
    ).toBe(
      [
        "#!/bin/bash",
        'export EPOCHS="3"',
        'export DATA_DIR="$HOME/data"',
        'export GREETING="say \\"hi\\" \\`now\\`"',
        "",
      ].join("\n"),
    );
  });

  it("renders only the shebang for no variables", () => {
    expect(renderEnvScript({})).toBe("#!/bin/bash\n");
  });
});
