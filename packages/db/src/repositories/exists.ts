/** `exists` never raises: a lookup that fails for any reason reports the entity as absent. */
export async function existsQuietly(check: () => Promise<unknown>): Promise<boolean> {
  try {
    await check();
    return true;
  } catch {
    return false;
  }
}
