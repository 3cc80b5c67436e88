/**
 * @tabula-js/tabula-syntax
 *
 * Declaration front end for tabula registries: `Class("Dog").from("Animal")({ ... })`.
 */

export * from "./class-syntax";
