const REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)\b/g

/**
 * User variables merged with the built-ins: `ENV_<NAME>` for every
 * environment variable and `PWD`. Built-ins win on conflict.
 */
export function buildVariables(
  user: Record<string, string>,
  {
    env = process.env,
    cwd = process.cwd(),
  }: { env?: NodeJS.ProcessEnv; cwd?: string } = {}
): Map<string, string> {
  const variables = new Map(Object.entries(user))

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) variables.set(`ENV_${key}`, value)
  }
  variables.set("PWD", cwd)

  return variables
}

/**
 * Replaces `${NAME}` and `$NAME` references. Unknown names are left as
 * written, and substituted values are not scanned again.
 */
export function substituteVariables(
  text: string,
  variables: ReadonlyMap<string, string>
): string {
  return text.replace(
    REFERENCE,
    (reference: string, braced: string | undefined, bare: string | undefined) =>
      variables.get(braced ?? bare ?? "") ?? reference
  )
}
