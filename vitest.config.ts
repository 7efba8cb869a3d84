import { defineConfig } from "vitest/config";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    // alias for every top level directory in src
    alias: Object.fromEntries(
      fs
        .readdirSync(path.resolve(root, "src"), { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory())
        .map((dirent) => [dirent.name, path.resolve(root, `./src/${dirent.name}`)]),
    ),
  },
});
