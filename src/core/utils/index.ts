export function conditionalExecute<T>({ condition, execute }: { condition: boolean, execute: () => T }) {
  if (condition) {
    return execute()
  }
}

export async function waitMap<T, K>(fn: (v: T) => Promise<K>, items: readonly T[]): Promise<K[]> {
  const result: K[] = []
  for (let item of items) {
    const value = await fn(item)
    result.push(value)
  }
  return result
}

export function executableName(name: string, platform: NodeJS.Platform = process.platform) {
  if (platform === "win32" && !name.endsWith(".exe")) {
    return name.concat(".exe")
  }

  return name
}
