/** agentpod release, stamped into session rows and container labels */
export const AGENTPOD_VERSION = "0.3.0";
