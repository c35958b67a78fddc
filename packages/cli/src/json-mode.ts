let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

export function globalJsonMode(): boolean {
  return jsonMode;
}
