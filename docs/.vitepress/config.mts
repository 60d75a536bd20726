import { fileURLToPath } from "node:url";
import { defineConfigWithTheme } from "vitepress";
import { retinaImagesPlugin } from "./retina-images";
import type { BlogThemeConfig } from "./theme/types";

const publicDir = fileURLToPath(new URL("../public", import.meta.url));

export default defineConfigWithTheme<BlogThemeConfig>({
  title: "Tech Blog",
  description: "Notes on building and running software",
  cleanUrls: true,
  vite: {
    plugins: [retinaImagesPlugin(publicDir)],
  },
  themeConfig: {
    nav: [
      { text: "Home", link: "/" },
      { text: "Posts", link: "/posts/hello-lightbox" },
    ],
    sidebar: [
      {
        text: "Posts",
        items: [{ text: "Hello, lightbox", link: "/posts/hello-lightbox" }],
      },
    ],
    lightbox: {
      minSize: 100,
      hint: "Click to expand",
    },
    search: {
      provider: "local",
    },
  },
});
