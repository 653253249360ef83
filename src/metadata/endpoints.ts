export const METADATA_URL = "http://169.254.169.254/latest/meta-data/";
export const LOCAL_IPV4_URL = "http://169.254.169.254/latest/meta-data/local-ipv4/";
export const INSTANCE_IDENTITY_URL = "http://169.254.169.254/latest/dynamic/instance-identity/document";
export const USER_DATA_URL = "http://169.254.169.254/latest/user-data";
export const TASK_ROLE_BASE_URL = "http://169.254.170.2";
export const ECS_AGENT_PORT = 51678;

export function ecsAgentUrl(localIp: string): string {
  return `http://${localIp}:${ECS_AGENT_PORT}`;
}
