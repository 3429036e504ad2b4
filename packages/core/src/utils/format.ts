/**
 * Replace `{name}` placeholders with values. Unknown placeholders are left
 * in place so a broken template stays visible in the output.
 */
export function formatMessage(
  template: string,
  values: { [name: string]: string | number | boolean }
): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, name: string) => {
    const value = values[name];
    return value === undefined ? match : String(value);
  });
}
