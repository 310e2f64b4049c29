import tseslint from "typescript-eslint";
import globals from "globals";
import { globalIgnores } from "eslint/config";

export default tseslint.config(
	{
		languageOptions: {
			globals: {
				...globals.node,
			},
			parserOptions: {
				projectService: {
					allowDefaultProject: ["eslint.config.mts"],
				},
				tsconfigRootDir: import.meta.dirname,
			},
		},
	},
	...tseslint.configs.recommendedTypeChecked,
	{
		rules: {
			"no-console": "error",
			"@typescript-eslint/no-floating-promises": "error",
		},
	},
	globalIgnores(["node_modules", "dist", "coverage", "vitest.config.ts"]),
);
