// CHANGE: Marketplace ids that need an alias or must be skipped.

/**
 * Marketplace plugins that cannot be processed as listed.
 *
 * `alias` replaces the id for the details request only; `skip` drops the plugin without any
 * network call.
 */
export type PluginException =
  | { readonly kind: "alias"; readonly detailsId: string }
  | { readonly kind: "skip"; readonly reason: string };

const EXCEPTIONS: ReadonlyMap<string, PluginException> = new Map<string, PluginException>([
  // The real id trips up the details endpoint.
  ["23.bytecode-disassembler", { kind: "alias", detailsId: "bytecode-disassembler" }],
  ["com.valord577.mybatis-navigator", { kind: "skip", reason: "invalid version numbers" }],
  ["io.github.kings1990.FastRequest", { kind: "skip", reason: "archive contains invalid file names" }],
  ["com.majera.intellij.codereview.gitlab", { kind: "skip", reason: "archive contains invalid file names" }]
]);

/**
 * Decide which id to query the details endpoint with.
 *
 * @param pluginId - Id from the candidate index.
 * @returns The id to query, or the reason the plugin is skipped.
 */
export function detailsIdFor(pluginId: string): { readonly detailsId: string } | { readonly skipped: string } {
  const exception = EXCEPTIONS.get(pluginId);
  if (!exception) {
    return { detailsId: pluginId };
  }
  return exception.kind === "alias" ? { detailsId: exception.detailsId } : { skipped: exception.reason };
}
