import type { Component } from "./component.js";
import { FormDecoration, PageDecoration } from "./decorations.js";

export type RootOptions = {
  title?: string;
  stylesheets?: readonly string[];
  javascripts?: readonly string[];
};

/**
 * Prepares a component to be a session's root: form scoping first, then the
 * document around it, each only when the chain lacks one.
 */
export function decorateAsRoot<C extends Component>(component: C, options: RootOptions = {}): C {
  if (!component.findDecoration((d) => d instanceof FormDecoration)) {
    component.addDecoration(new FormDecoration());
  }
  if (!component.findDecoration((d) => d instanceof PageDecoration)) {
    component.addDecoration(
      new PageDecoration({
        title: options.title ?? component.constructor.name,
        stylesheets: options.stylesheets,
        javascripts: options.javascripts,
      }),
    );
  }
  return component;
}
