/**
 * Minimal contract for objects that hold resources requiring cleanup
 * (transports, decoded photos, frame callbacks).
 */
export interface Disposable {
  /** Release all resources held by this object. */
  dispose(): void;
}
