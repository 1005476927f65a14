import { type Config } from "prettier";

const config: Config = {
  printWidth: 100,
  tabWidth: 2,
  useTabs: false,
  semi: true,
  singleQuote: false,
  trailingComma: "all",
  arrowParens: "always",
  proseWrap: "always",
  endOfLine: "lf",
  quoteProps: "as-needed",
  overrides: [
    {
      // Release notes are copied from here verbatim; keep authors' line breaks
      files: ["CHANGELOG.md"],
      options: {
        proseWrap: "preserve",
      },
    },
    {
      files: ["*.yaml", "*.yml"],
      options: {
        proseWrap: "preserve",
      },
    },
  ],
};

export default config;
