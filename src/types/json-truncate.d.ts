// json-truncate ships no type declarations
declare module "json-truncate" {
  export default function truncate(
    obj: unknown,
    options?: { maxDepth?: number; replace?: unknown },
  ): unknown;
}
