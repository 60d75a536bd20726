import type { DefaultTheme } from "vitepress";
import type { LightboxOptions } from "./lightbox";

export interface BlogThemeConfig extends DefaultTheme.Config {
  lightbox?: LightboxOptions;
}
