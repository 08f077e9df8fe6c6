import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			reporter: ["text"],
			include: ["packages/**/src/**/*.ts"],
			exclude: ["**/*.d.ts", "**/index.ts"],
		},
		projects: [
			// Every package runs under plain Node; nothing here touches a browser
			{
				test: {
					name: "node",
					environment: "node",
					include: ["./packages/**/test/**/*.{test,spec}.ts"],
					exclude: ["node_modules/**"],
				},
			},
		],
	},
});
