const trimSlashes = (value: string): string => value.replace(/^\/+/, '');

export const makeRawUrl = (repoSlug: string, branch: string, repoRelPath: string): string =>
  `https://raw.githubusercontent.com/${repoSlug}/${branch}/${trimSlashes(repoRelPath)}`;

export const makeGithubBlobUrl = (repoSlug: string, branch: string, repoRelPath: string): string =>
  `https://github.com/${repoSlug}/blob/${branch}/${trimSlashes(repoRelPath)}`;

/** Published Learn URL of a scenario YAML file: docs prefix and extension removed. */
export const makeLearnUrl = (learnBaseUrl: string, docsRoot: string, repoRelYml: string): string => {
  let p = repoRelYml.replace(/\\/g, '/');
  const prefix = `${docsRoot.replace(/^\.?\/+|\/+$/g, '')}/`;
  if (prefix !== '/' && p.startsWith(prefix)) {
    p = p.slice(prefix.length);
  }
  p = p.replace(/\.ya?ml$/i, '');
  return `${learnBaseUrl.replace(/\/+$/, '')}/${p}`;
};
