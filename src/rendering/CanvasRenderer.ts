import type { Vector2 } from '../physics/Vector2.js';

// Canvas 2D wrapper. World origin sits at the canvas centre with +y pointing
// down the screen; everything else is drawn in world units.
export class CanvasRenderer {
  private canvas: HTMLCanvasElement;
  private context: CanvasRenderingContext2D;
  private pixelRatio: number;

  constructor(canvas: HTMLCanvasElement) {
    this.canvas = canvas;
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new Error('Could not get 2D rendering context');
    }
    this.context = ctx;
    this.pixelRatio = window.devicePixelRatio || 1;
    this.setupCanvas();
  }

  /**
   * Size the backing store to the element's CSS box in device pixels
   */
  private setupCanvas(): void {
    const rect = this.canvas.getBoundingClientRect();
    this.pixelRatio = window.devicePixelRatio || 1;

    const w = Math.max(1, Math.floor(rect.width * this.pixelRatio));
    const h = Math.max(1, Math.floor(rect.height * this.pixelRatio));
    if (this.canvas.width !== w) this.canvas.width = w;
    if (this.canvas.height !== h) this.canvas.height = h;

    // Reset then scale to avoid compounding on repeated setup
    this.context.setTransform(1, 0, 0, 1, 0, 0);
    this.context.scale(this.pixelRatio, this.pixelRatio);
  }

  // Browser zoom changes DPR without a resize event
  private refreshDprIfNeeded(): void {
    const dpr = window.devicePixelRatio || 1;
    if (Math.abs(dpr - this.pixelRatio) > 1e-3) {
      this.setupCanvas();
    }
  }

  /** Logical (CSS pixel) size of the drawing surface */
  getSize(): { width: number; height: number } {
    return {
      width: this.canvas.width / this.pixelRatio,
      height: this.canvas.height / this.pixelRatio,
    };
  }

  fill(color: string): void {
    const { width, height } = this.getSize();
    this.context.fillStyle = color;
    this.context.fillRect(0, 0, width, height);
  }

  beginFrame(): void {
    this.refreshDprIfNeeded();
    this.context.save();
    const { width, height } = this.getSize();
    this.context.translate(width / 2, height / 2);
  }

  endFrame(): void {
    this.context.restore();
  }

  drawCircle(center: Vector2, radius: number, fillColor?: string, strokeColor?: string, lineWidth = 1): void {
    this.context.beginPath();
    this.context.arc(center.x, center.y, radius, 0, 2 * Math.PI);

    if (fillColor) {
      this.context.fillStyle = fillColor;
      this.context.fill();
    }

    if (strokeColor) {
      this.context.strokeStyle = strokeColor;
      this.context.lineWidth = lineWidth;
      this.context.stroke();
    }
  }

  /**
   * Draw connected line segments through the points, in order.
   * Fewer than two points draws nothing.
   */
  drawPolyline(points: readonly Vector2[], color: string, lineWidth = 1): void {
    if (points.length < 2) return;
    this.context.beginPath();
    this.context.moveTo(points[0].x, points[0].y);
    for (let i = 1; i < points.length; i++) {
      this.context.lineTo(points[i].x, points[i].y);
    }
    this.context.strokeStyle = color;
    this.context.lineWidth = lineWidth;
    this.context.stroke();
  }

  // Screen-space text; call outside beginFrame/endFrame
  drawText(text: string, position: Vector2, color = '#000000', font = '14px monospace', align: CanvasTextAlign = 'left'): void {
    this.context.fillStyle = color;
    this.context.font = font;
    this.context.textAlign = align;
    this.context.fillText(text, position.x, position.y);
  }

  handleResize(): void {
    this.setupCanvas();
  }
}
