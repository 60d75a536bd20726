import type { Theme } from "vitepress";
import { useData, useRoute } from "vitepress";
import DefaultTheme from "vitepress/theme";
import { nextTick, onMounted, onUnmounted, watch } from "vue";
import { DEFAULT_CONTAINERS, Lightbox } from "./lightbox";
import type { BlogThemeConfig } from "./types";
import "./custom.css";

export default {
  extends: DefaultTheme,
  setup() {
    const { theme } = useData<BlogThemeConfig>();
    const route = useRoute();

    // VitePress renders Markdown inside .vp-doc
    const lightbox = new Lightbox({
      containers: [...DEFAULT_CONTAINERS, ".vp-doc"],
      ...theme.value.lightbox,
    });

    onMounted(() => lightbox.mount(document));
    onUnmounted(() => lightbox.unmount());

    watch(
      () => route.path,
      () => {
        lightbox.close();
        void nextTick(() => lightbox.refresh());
      },
    );
  },
} satisfies Theme;
