import http from 'node:http';
import https from 'node:https';

export interface AgentPair {
  httpAgent: http.Agent;
  httpsAgent: https.Agent;
}

export function createAgents(verifyTls: boolean): AgentPair {
  return {
    httpAgent: new http.Agent({ keepAlive: true, keepAliveMsecs: 60000 }),
    httpsAgent: new https.Agent({
      keepAlive: true,
      keepAliveMsecs: 60000,
      rejectUnauthorized: verifyTls,
    }),
  };
}

export function destroyAgents(agents: AgentPair): void {
  agents.httpAgent.destroy();
  agents.httpsAgent.destroy();
}
