import path from "path";

export function getRepoRoot(): string {
  const override = process.env.APKF_REPO_ROOT?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.resolve(__dirname, "..");
}

export function getTemplatesRoot(): string {
  const override = process.env.APKF_TEMPLATES_ROOT?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(getRepoRoot(), "templates");
}

export function getSchemasRoot(): string {
  return path.join(getRepoRoot(), "schemas");
}
