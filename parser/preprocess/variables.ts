const VARIABLE_MARKER = /\{\$([A-Za-z0-9_.-]+)\}/g;

/**
 * Replaces `{$name}` markers with values from the map. Names that are not
 * in the map keep their marker.
 */
export function substituteVariables(text: string, variables: Readonly<Record<string, string>>): string {
  if (text.indexOf('{$') < 0) return text;
  return text.replace(VARIABLE_MARKER, (marker, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : marker
  );
}
