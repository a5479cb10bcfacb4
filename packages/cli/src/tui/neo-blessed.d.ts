/**
 * Type declarations for neo-blessed
 *
 * Neo-blessed is a fork of blessed with modern Node.js support and ships no
 * types. This covers the parts the viewer screen uses.
 */

declare module 'neo-blessed' {
  export namespace Widgets {
    interface NodeOptions {
      parent?: Node;
      top?: number | string;
      left?: number | string;
      bottom?: number | string;
      width?: number | string;
      height?: number | string;
      hidden?: boolean;
      style?: StyleOptions;
    }

    interface StyleOptions {
      fg?: string;
      bg?: string;
      bold?: boolean;
      border?: {
        fg?: string;
      };
    }

    interface BoxOptions extends NodeOptions {
      border?: { type: 'line' };
      tags?: boolean;
      mouse?: boolean;
      wrap?: boolean;
    }

    interface ScreenOptions {
      smartCSR?: boolean;
      title?: string;
      fullUnicode?: boolean;
      input?: NodeJS.ReadableStream;
      output?: NodeJS.WritableStream;
    }

    interface Node {
      show(): void;
      hide(): void;
      destroy(): void;
    }

    interface MouseEvent {
      y: number;
    }

    interface BoxElement extends Node {
      top: number | string;
      height: number | string;
      /** Absolute top row on screen */
      readonly atop: number;
      setContent(content: string): void;
      on(event: 'wheelup' | 'wheeldown', callback: () => void): this;
      on(event: 'click', callback: (data: MouseEvent) => void): this;
    }

    interface Screen extends Node {
      readonly width: number;
      readonly height: number;
      render(): void;
      on(event: 'keypress', callback: (ch: string | undefined, key: KeyEvent) => void): this;
      on(event: 'resize', callback: () => void): this;
    }

    interface KeyEvent {
      full: string;
      name?: string;
      ctrl: boolean;
      meta: boolean;
    }
  }

  export function screen(options?: Widgets.ScreenOptions): Widgets.Screen;
  export function box(options?: Widgets.BoxOptions): Widgets.BoxElement;

  const blessed: {
    screen: typeof screen;
    box: typeof box;
  };

  export default blessed;
}
