const SEMVER_REGEX = /^(\d+)\.(\d+)\.(\d+)$/

export function isSemver(version: string): boolean {
  return SEMVER_REGEX.test(version)
}

export function bumpPatch(version: string): string {
  const match = SEMVER_REGEX.exec(version)
  if (!match) {
    throw new Error(`Not a semantic version: ${version}`)
  }
  const [, major, minor, patch] = match
  return `${major}.${minor}.${Number(patch) + 1}`
}

export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(Number)
  const pb = b.split('.').map(Number)
  for (let i = 0; i < 3; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}
