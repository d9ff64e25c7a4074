import type { BytesFn, DecodeFn, EncodeFn, Hook } from "../../ports/hook"

function fold<F>(hooks: readonly Hook[], base: F, wrap: (hook: Hook, next: F) => F): F {
  // Fold from the right so the first hook ends up outermost.
  return hooks.reduceRight<F>((next, hook) => wrap(hook, next), base)
}

export function composeEncode<T>(hooks: readonly Hook[], base: EncodeFn<T>): EncodeFn<T> {
  return fold(hooks, base, (hook, next) => hook.wrapEncode?.(next) ?? next)
}

export function composeDecode<T>(hooks: readonly Hook[], base: DecodeFn<T>): DecodeFn<T> {
  return fold(hooks, base, (hook, next) => hook.wrapDecode?.(next) ?? next)
}

export function composeCompress(hooks: readonly Hook[], base: BytesFn): BytesFn {
  return fold(hooks, base, (hook, next) => hook.wrapCompress?.(next) ?? next)
}

export function composeDecompress(hooks: readonly Hook[], base: BytesFn): BytesFn {
  return fold(hooks, base, (hook, next) => hook.wrapDecompress?.(next) ?? next)
}
