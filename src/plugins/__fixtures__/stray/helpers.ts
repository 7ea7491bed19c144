export function process(): never {
  throw new Error("stray helper should never be loaded as a plugin");
}
