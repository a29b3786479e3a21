import { defineConfig } from "tsup";

export default defineConfig({
	entry: ["src/index.ts", "src/lite.ts"],
	format: ["esm"],
	dts: true,
	clean: true,
	treeshake: true,
	sourcemap: false,
	target: "es2022",
});
