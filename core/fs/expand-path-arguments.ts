import fg from 'fast-glob'

/**
 * Turns command arguments into root paths for the walker.
 *
 * Literal paths are kept as given. Glob patterns are expanded against `cwd`
 * (dotfiles included, symbolic links not followed) and their matches sorted; a
 * pattern without matches contributes nothing. With no arguments the working
 * directory itself is the only root. Duplicates are dropped, first occurrence
 * wins.
 *
 * @param args - File, directory or glob arguments.
 * @param cwd - Working directory.
 * @returns Root paths, relative to `cwd` unless given as absolute.
 */
export async function expandPathArguments(
  args: readonly string[],
  cwd: string,
): Promise<string[]> {
  if (args.length === 0) {
    return ['.']
  }

  let roots: string[] = []
  for (let arg of args) {
    if (!fg.isDynamicPattern(arg)) {
      roots.push(arg)
      continue
    }

    let matches = await fg(arg, {
      followSymbolicLinks: false,
      onlyFiles: false,
      dot: true,
      cwd,
    })
    roots.push(...matches.sort())
  }

  return [...new Set(roots)]
}
