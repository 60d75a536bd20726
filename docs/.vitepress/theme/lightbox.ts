export const DEFAULT_CONTAINERS: readonly string[] = [".post-body", ".article-content"];

export interface LightboxOptions {
  /** Selectors of the regions whose images get click-to-enlarge. */
  containers?: readonly string[];
  /** Images narrower or shorter than this are treated as icons and skipped. */
  minSize?: number;
  hint?: string;
}

export interface LightboxSource {
  src: string;
  alt?: string;
}

export function isExpandable(img: HTMLImageElement, minSize: number): boolean {
  return !img.closest("a") && img.width >= minSize && img.height >= minSize;
}

interface BoundImage {
  /** Title the image carried before the hint replaced it. */
  title: string | null;
  listeners: AbortController;
}

export class Lightbox {
  private readonly containers: readonly string[];
  private readonly minSize: number;
  private readonly hint: string;

  private root: Document | null = null;
  private overlay: HTMLDivElement | null = null;
  private image: HTMLImageElement | null = null;
  private listeners: AbortController | null = null;
  private readonly bound = new Map<HTMLImageElement, BoundImage>();
  // images still loading that may qualify once they have a size
  private readonly pending = new Map<HTMLImageElement, AbortController>();

  constructor(options: LightboxOptions = {}) {
    this.containers = options.containers ?? DEFAULT_CONTAINERS;
    this.minSize = options.minSize ?? 100;
    this.hint = options.hint ?? "Click to expand";
  }

  get isOpen(): boolean {
    return this.overlay?.classList.contains("active") ?? false;
  }

  mount(root: Document = document): void {
    if (this.overlay) return;

    const listeners = new AbortController();
    const { signal } = listeners;

    const overlay = root.createElement("div");
    overlay.className = "lightbox";

    const closeButton = root.createElement("button");
    closeButton.type = "button";
    closeButton.className = "lightbox-close";
    closeButton.setAttribute("aria-label", "Close");
    closeButton.textContent = "×";

    const image = root.createElement("img");
    image.className = "lightbox-content";
    image.alt = "";

    overlay.append(closeButton, image);
    root.body.appendChild(overlay);

    closeButton.addEventListener("click", () => this.close(), { signal });
    overlay.addEventListener(
      "click",
      (e: MouseEvent) => {
        if (e.target === overlay) this.close();
      },
      { signal },
    );
    image.addEventListener("contextmenu", (e: MouseEvent) => e.preventDefault(), { signal });
    root.addEventListener(
      "keydown",
      (e: KeyboardEvent) => {
        if (e.key === "Escape") this.close();
      },
      { signal },
    );
    root.defaultView?.addEventListener("popstate", () => this.close(), { signal });

    this.root = root;
    this.overlay = overlay;
    this.image = image;
    this.listeners = listeners;

    this.refresh();
  }

  /** Binds qualifying images that appeared since the last call. */
  refresh(): void {
    const { root } = this;
    if (!root || this.containers.length === 0) return;

    this.bound.forEach(({ listeners }, img) => {
      if (img.isConnected) return;
      listeners.abort();
      this.bound.delete(img);
    });
    this.pending.forEach((listeners, img) => {
      if (img.isConnected) return;
      listeners.abort();
      this.pending.delete(img);
    });

    const selector = this.containers.map((container) => `${container} img`).join(", ");
    root.querySelectorAll<HTMLImageElement>(selector).forEach((img) => {
      if (this.bound.has(img) || this.overlay?.contains(img)) return;

      if (!isExpandable(img, this.minSize)) {
        if (!img.complete) this.recheckOnLoad(img);
        return;
      }

      this.pending.get(img)?.abort();
      this.pending.delete(img);
      this.bind(img);
    });
  }

  private bind(img: HTMLImageElement): void {
    const listeners = new AbortController();
    img.addEventListener(
      "click",
      (e: MouseEvent) => {
        e.preventDefault();
        this.open(img);
      },
      { signal: listeners.signal },
    );

    this.bound.set(img, { title: img.getAttribute("title"), listeners });
    img.style.cursor = "pointer";
    img.title = this.hint;
  }

  private recheckOnLoad(img: HTMLImageElement): void {
    if (this.pending.has(img)) return;

    const listeners = new AbortController();
    img.addEventListener(
      "load",
      () => {
        this.pending.delete(img);
        this.refresh();
      },
      { once: true, signal: listeners.signal },
    );
    this.pending.set(img, listeners);
  }

  open(source: LightboxSource): void {
    const { root, overlay, image } = this;
    if (!root || !overlay || !image) return;

    image.src = source.src;
    image.alt = source.alt ?? "";
    overlay.classList.add("active");
    root.body.style.overflow = "hidden";
  }

  close(): void {
    if (!this.root || !this.overlay || !this.isOpen) return;

    this.overlay.classList.remove("active");
    this.root.body.style.overflow = "";
  }

  unmount(): void {
    if (!this.overlay) return;

    this.close();
    this.listeners?.abort();
    this.overlay.remove();

    this.pending.forEach((listeners) => listeners.abort());
    this.pending.clear();

    this.bound.forEach(({ title, listeners }, img) => {
      listeners.abort();
      img.style.removeProperty("cursor");
      if (title === null) img.removeAttribute("title");
      else img.title = title;
    });
    this.bound.clear();

    this.root = null;
    this.overlay = null;
    this.image = null;
    this.listeners = null;
  }
}
