import { defineConfig, type Plugin } from "vite";
import { fileURLToPath } from "node:url";

const src = (file: string): string =>
  fileURLToPath(new URL(`./src/${file}`, import.meta.url));

/**
 * Replace __DEV__ with a runtime process.env check so consumers'
 * bundlers can tree-shake dev-only code paths.
 */
function replaceDevGlobals(): Plugin {
  return {
    name: "replace-dev-globals",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

// https://vite.dev/config/
export default defineConfig(({ command }) => ({
  plugins: command === "build" ? [replaceDevGlobals()] : [],

  define:
    command === "build"
      ? {}
      : {
          __DEV__: "true",
        },

  build: {
    target: "node20",
    lib: {
      entry: {
        index: src("index.ts"),
        cli: src("cli.ts"),
      },
      formats: ["es", "cjs"],
      fileName: (format, entry_name) =>
        `${entry_name}.${format === "es" ? "js" : "cjs"}`,
    },
    rollupOptions: {
      external: [/^node:/],
    },
  },
}));
