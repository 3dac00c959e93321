/** Splits a task string such as `tap-a map-b target-c` into plugin tokens. */
export function parseTaskChain(task: string): string[] {
  return task.split(/\s+/).filter((token) => token.length > 0);
}

/** `dbt:run` invokes the `dbt` plugin; bare tokens name the plugin itself. */
export function pluginNameOf(token: string): string {
  const idx = token.indexOf(':');
  return idx === -1 ? token : token.slice(0, idx);
}
