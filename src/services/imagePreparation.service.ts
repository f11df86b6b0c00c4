import fs from "fs/promises";
import sharp from "sharp";
import { logger } from "../utils/logger";
import { ImageError, errorMessage } from "../utils/errors";
import { IMAGE_MIME_TYPES, RasterFormat } from "../utils/constants";

export interface ImageInfo {
  format: RasterFormat;
  width: number;
  height: number;
  channels: number;
  fileSize: number;
}

export interface PreparedImage {
  base64: string;
  info: ImageInfo;
  mimeType: string;
  dataUrl: string;
}

const isRasterFormat = (format: string | undefined): format is RasterFormat =>
  format !== undefined && Object.prototype.hasOwnProperty.call(IMAGE_MIME_TYPES, format);

const isDecodedRaster = (metadata: sharp.Metadata): boolean =>
  isRasterFormat(metadata.format) &&
  metadata.width !== undefined &&
  metadata.height !== undefined;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const formatFileSize = (sizeBytes: number): string => {
  if (sizeBytes === 0) return "0 B";

  const units = ["B", "KB", "MB", "GB"];
  let size = sizeBytes;
  let i = 0;
  while (size >= 1024 && i < units.length - 1) {
    size /= 1024;
    i++;
  }
  return `${size.toFixed(1)} ${units[i]}`;
};

/**
 * Prepares wearable screenshots for the model request.
 */
export class ImagePreparationService {
  async validateImage(imagePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(imagePath);
      if (!stat.isFile()) return false;

      return isDecodedRaster(await sharp(imagePath).metadata());
    } catch (error) {
      logger.debug(`Image check failed for ${imagePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  async encodeImage(imagePath: string): Promise<string> {
    try {
      const buffer = await fs.readFile(imagePath);
      return buffer.toString("base64");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ImageError(`Image file not found: ${imagePath}`, error);
      }
      throw new ImageError(`Failed to encode image: ${errorMessage(error)}`, error);
    }
  }

  async getImageInfo(imagePath: string): Promise<ImageInfo> {
    const [metadata, stat] = await Promise.all([
      sharp(imagePath).metadata(),
      fs.stat(imagePath),
    ]);
    if (!isRasterFormat(metadata.format)) {
      throw new ImageError(`Unsupported image format: ${metadata.format ?? "unknown"}`);
    }
    return {
      format: metadata.format,
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
      channels: metadata.channels ?? 0,
      fileSize: stat.size,
    };
  }

  async prepareImage(imagePath: string): Promise<PreparedImage> {
    if (!(await this.validateImage(imagePath))) {
      throw new ImageError(`Invalid or unreadable image: ${imagePath}`);
    }

    const info = await this.getImageInfo(imagePath);
    const base64 = await this.encodeImage(imagePath);
    const mimeType = IMAGE_MIME_TYPES[info.format];

    logger.info(
      `Prepared ${info.format} image ${info.width}x${info.height} (${formatFileSize(info.fileSize)})`
    );

    return {
      base64,
      info,
      mimeType,
      dataUrl: `data:${mimeType};base64,${base64}`,
    };
  }

  /**
   * Same checks as `prepareImage` for an image that arrived base64-encoded.
   * The MIME type comes from the decoded bytes, not from the sender.
   */
  async prepareEncodedImage(base64: string): Promise<PreparedImage> {
    const buffer = Buffer.from(base64, "base64");

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(buffer).metadata();
    } catch (error) {
      logger.debug(`Inline image check failed: ${errorMessage(error)}`);
      throw new ImageError("Invalid or unreadable inline image", error);
    }
    if (!isDecodedRaster(metadata) || !isRasterFormat(metadata.format)) {
      throw new ImageError("Invalid or unreadable inline image");
    }

    const info: ImageInfo = {
      format: metadata.format,
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
      channels: metadata.channels ?? 0,
      fileSize: buffer.length,
    };
    const encoded = buffer.toString("base64");
    const mimeType = IMAGE_MIME_TYPES[info.format];

    logger.info(
      `Prepared inline ${info.format} image ${info.width}x${info.height} (${formatFileSize(info.fileSize)})`
    );

    return {
      base64: encoded,
      info,
      mimeType,
      dataUrl: `data:${mimeType};base64,${encoded}`,
    };
  }
}

export const imagePreparationService = new ImagePreparationService();
