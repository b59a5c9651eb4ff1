// Scroll offset of the page, in CSS pixels
export interface ScrollPosition {
  x: number;
  y: number;
}

// Viewport dimensions, in CSS pixels
export interface ViewportSize {
  width: number;
  height: number;
}
