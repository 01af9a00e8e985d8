import { defineConfig } from "../src/config";

export default defineConfig({
  permalink: "date",
  dateLocale: "en",
  site: {
    title: "Field Notes",
    description: "Occasional writing about small tools and long walks.",
  },
});
