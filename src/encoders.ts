import type sharp from "sharp";

export type ImageFormat = "jpeg" | "png" | "webp" | "gif" | "other";

export type EncodableFormat = Exclude<ImageFormat, "other">;

export type Encoder = (pipeline: sharp.Sharp, metadata: sharp.Metadata, quality: number) => sharp.Sharp;

const WHITE = { r: 255, g: 255, b: 255 };

/**
 * Maps the format reported by the decoder onto the formats this tool
 * re-encodes. Anything else is copied through untouched.
 */
export function classifyFormat(format: string | undefined): ImageFormat {
  switch (format) {
    case "jpeg":
    case "jpg":
      return "jpeg";
    case "png":
      return "png";
    case "webp":
      return "webp";
    case "gif":
      return "gif";
    default:
      return "other";
  }
}

export const ENCODERS: Record<EncodableFormat, Encoder> = {
  jpeg: (pipeline, metadata, quality) => {
    // JPEG has no alpha channel
    let out = metadata.hasAlpha ? pipeline.flatten({ background: WHITE }) : pipeline;
    if (metadata.exif) {
      out = out.keepExif();
    }
    return out.jpeg({ quality, optimiseCoding: true, progressive: true });
  },

  png: (pipeline, metadata) => {
    if (metadata.paletteBitDepth) {
      // Keep indexed images indexed; every existing colour fits the palette.
      return pipeline.png({
        compressionLevel: 9,
        palette: true,
        colours: 2 ** metadata.paletteBitDepth,
        quality: 100,
        dither: 0,
        effort: 10,
      });
    }
    return pipeline.png({ compressionLevel: 9, adaptiveFiltering: true });
  },

  webp: (pipeline, _metadata, quality) => pipeline.webp({ quality, effort: 6 }),

  // Frames survive because the input is opened with `animated: true`.
  gif: (pipeline) => pipeline.gif(),
};
