import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/integrity": {
      entry: ["src/**/index.ts", "examples/*.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts", "examples/**/*.ts"],
      ignore: ["**/test-utils.ts"],
    },
  },
};

export default config;
