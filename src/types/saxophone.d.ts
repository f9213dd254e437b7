/**
 * Type declarations for saxophone (the package ships none)
 */

declare module 'saxophone' {
  namespace Saxophone {
    interface TagOpenNode {
      name: string;
      /** Raw attribute string, parse with `Saxophone.parseAttrs` */
      attrs: string;
      isSelfClosing: boolean;
    }

    interface TagCloseNode {
      name: string;
    }

    interface TextNode {
      contents: string;
    }
  }

  class Saxophone {
    constructor();

    on(event: 'tagopen', listener: (tag: Saxophone.TagOpenNode) => void): this;
    on(event: 'tagclose', listener: (tag: Saxophone.TagCloseNode) => void): this;
    on(
      event: 'text' | 'cdata' | 'comment' | 'processinginstruction',
      listener: (node: Saxophone.TextNode) => void
    ): this;
    on(event: 'error', listener: (error: Error) => void): this;
    on(event: 'finish', listener: () => void): this;

    write(chunk: Uint8Array | string): boolean;
    end(chunk?: Uint8Array | string): this;
    parse(input: Uint8Array | string): this;

    static parseAttrs(attrs: string): Record<string, string>;
    static parseEntities(text: string): string;
  }

  export = Saxophone;
}
