export type VersionInfo = Readonly<{
  version: string;
  gitSha: string;
  builtAt: string;
}>;

export function getVersionInfo(env: Record<string, string | undefined> = process.env): VersionInfo {
  const version = env.DNS_FORWARDER_VERSION || 'dev';
  const gitSha = env.DNS_FORWARDER_GIT_SHA || env.GIT_SHA || version;
  const builtAt = env.DNS_FORWARDER_BUILD_TIMESTAMP || env.BUILD_TIMESTAMP || '';
  return { version, gitSha, builtAt };
}
