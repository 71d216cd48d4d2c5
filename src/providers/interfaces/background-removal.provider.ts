/**
 * BackgroundRemovalProvider Interface
 *
 * Turns an image into a PNG whose alpha channel marks the subject.
 * The compositor treats implementations as an opaque function.
 */
export interface BackgroundRemovalProvider {
  /** Provider identifier for logging */
  readonly providerId: string;

  /**
   * Remove the background from an encoded image
   * @param image - Encoded input image (PNG, JPEG, WebP)
   * @param filename - Original filename, used for MIME detection and logs
   * @returns Encoded PNG with transparency
   */
  removeBackground(image: Buffer, filename: string): Promise<Buffer>;

  /**
   * Check if provider is available/configured
   */
  isAvailable(): boolean;
}
