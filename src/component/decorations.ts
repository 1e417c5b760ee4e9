import type { RenderContext } from "../render/context.js";
import { escapeHtml } from "../utils.js";
import { Decoration } from "./decoration.js";

/** Wraps the output in a form posting back to the current page. */
export class FormDecoration extends Decoration {
  doRender(r: RenderContext): void {
    r.raw(`<form method="post" action="${escapeHtml(r.formAction())}">`);
    super.doRender(r);
    r.raw("</form>");
  }
}

export type PageDecorationOptions = {
  title: string;
  stylesheets?: readonly string[];
  javascripts?: readonly string[];
};

/** Wraps the output in a complete HTML document. */
export class PageDecoration extends Decoration {
  readonly title: string;
  readonly stylesheets: readonly string[];
  readonly javascripts: readonly string[];

  constructor(options: PageDecorationOptions) {
    super();
    this.title = options.title;
    this.stylesheets = options.stylesheets ?? [];
    this.javascripts = options.javascripts ?? [];
  }

  doRender(r: RenderContext): void {
    r.raw("<!DOCTYPE html><html><head><title>").text(this.title).raw("</title>");
    for (const href of this.stylesheets) {
      r.raw(`<link rel="stylesheet" type="text/css" href="${escapeHtml(href)}">`);
    }
    for (const src of this.javascripts) {
      r.raw(`<script type="text/javascript" src="${escapeHtml(src)}"></script>`);
    }
    r.raw("</head><body>");
    super.doRender(r);
    r.raw("</body></html>");
  }
}
