import { fileURLToPath } from "node:url";

// Keep this config dependency-free (no `vitest/config` import) so TypeScript
// doesn't require Vitest's type declarations just to open this file.
const root = fileURLToPath(new URL(".", import.meta.url));

export default {
  resolve: {
    alias: [
      // Root-relative imports like "@/lib/..."
      { find: /^@\//, replacement: root },
    ],
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
};
