import type { Plugin } from "vite";
import fs from "fs";
import path from "path";
import sharp from "sharp";

const IMG_RE = /<img([^>]*?)src="\/([^"]+\.webp)"([^>]*?)>/g;
const SIZE_ATTR_RE = /\s(width|height)=/;

export interface ImageSize {
  width: number;
  height: number;
}

/**
 * Adds a 1x/2x `srcset` to local webp images, plus intrinsic width and height
 * so the lightbox can measure them before they load.
 */
export function retinaImagesPlugin(publicDir: string): Plugin {
  let sizes = new Map<string, ImageSize>();

  return {
    name: "blog-retina-images",
    enforce: "pre",

    async buildStart() {
      sizes = await generateRetina1x(publicDir);
    },

    transform(code, id) {
      if (!id.endsWith(".md")) return null;

      const result = rewriteImageTags(code, sizes);
      return result !== code ? result : null;
    },
  };
}

export function rewriteImageTags(
  code: string,
  sizes: ReadonlyMap<string, ImageSize>,
): string {
  return code.replace(
    IMG_RE,
    (match: string, before: string, src: string, after: string) => {
      if (match.includes("data-no-retina")) return match;

      let extra = "";
      if (!match.includes("srcset=")) {
        const name = src.replace(/\.webp$/, "");
        extra += ` srcset="/_1x/${name}.webp 1x, /${src} 2x"`;
      }

      const size = sizes.get(src);
      if (size && !SIZE_ATTR_RE.test(match)) {
        extra += ` width="${size.width}" height="${size.height}"`;
      }

      return `<img${before}src="/${src}"${extra}${after}>`;
    },
  );
}

export async function generateRetina1x(
  dir: string,
): Promise<Map<string, ImageSize>> {
  const sizes = new Map<string, ImageSize>();
  if (!fs.existsSync(dir)) return sizes;

  const files = fs.readdirSync(dir).filter((f) => f.endsWith(".webp"));

  if (files.length === 0) return sizes;

  const oneXDir = path.join(dir, "_1x");
  if (!fs.existsSync(oneXDir)) {
    fs.mkdirSync(oneXDir, { recursive: true });
  }

  await Promise.all(
    files.map(async (file) => {
      const src = path.join(dir, file);
      const dest = path.join(oneXDir, file);

      const { width, height } = await sharp(src).metadata();
      if (!width || !height) return;

      const size = { width: Math.round(width / 2), height: Math.round(height / 2) };
      sizes.set(file, size);

      // Skip if already generated and up to date
      if (fs.existsSync(dest)) {
        const srcStat = fs.statSync(src);
        const destStat = fs.statSync(dest);
        if (destStat.mtimeMs >= srcStat.mtimeMs) return;
      }

      await sharp(src).resize(size.width).webp().toFile(dest);
    }),
  );

  return sizes;
}
