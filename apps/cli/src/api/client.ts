import type {
  EndpointRecord,
  InterfaceDetail,
  InterfaceRecord,
  SwitchRecord,
  TagPoolSummary,
  TagRecord,
  TagType,
  TopologyStats,
  UniRecord,
} from "@sdn-port-manager/shared";

export interface ApiClientConfig {
  baseUrl: string;
}

export class ApiClient {
  private baseUrl: string;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
  }

  private async request<T>(
    method: string,
    path: string,
    body?: unknown
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {};
    if (body) {
      headers["Content-Type"] = "application/json";
    }

    const response = await fetch(url, {
      method,
      headers,
      body: body ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      const errorBody = await response.json().catch(() => ({ error: response.statusText })) as { error?: string };
      throw new Error(errorBody.error || `API error: ${response.status}`);
    }

    return response.json() as Promise<T>;
  }

  // Switches
  async listSwitches(): Promise<SwitchRecord[]> {
    const result = await this.request<{ switches: SwitchRecord[] }>("GET", "/switches");
    return result.switches;
  }

  // Interfaces
  async listInterfaces(): Promise<InterfaceRecord[]> {
    const result = await this.request<{ interfaces: InterfaceRecord[] }>("GET", "/interfaces");
    return result.interfaces;
  }

  async getInterface(interfaceId: string): Promise<InterfaceDetail> {
    const result = await this.request<{ interface: InterfaceDetail }>(
      "GET",
      `/interfaces/${encodeURIComponent(interfaceId)}`
    );
    return result.interface;
  }

  async listEndpoints(interfaceId: string): Promise<EndpointRecord[]> {
    const result = await this.request<{ endpoints: EndpointRecord[] }>(
      "GET",
      `/interfaces/${encodeURIComponent(interfaceId)}/endpoints`
    );
    return result.endpoints;
  }

  async setCustomSpeed(interfaceId: string, bytesPerSecond: number | null): Promise<InterfaceDetail> {
    const result = await this.request<{ interface: InterfaceDetail }>(
      "PUT",
      `/interfaces/${encodeURIComponent(interfaceId)}/speed`,
      { bytesPerSecond }
    );
    return result.interface;
  }

  // Tags
  async getTagSummary(interfaceId: string): Promise<TagPoolSummary> {
    return this.request<TagPoolSummary>("GET", `/interfaces/${encodeURIComponent(interfaceId)}/tags`);
  }

  async isTagAvailable(interfaceId: string, type: TagType, value: number): Promise<boolean> {
    const result = await this.request<{ tag: TagRecord; available: boolean }>(
      "GET",
      `/interfaces/${encodeURIComponent(interfaceId)}/tags/${type}/${value}`
    );
    return result.available;
  }

  async allocateTag(interfaceId: string): Promise<TagRecord> {
    const result = await this.request<{ tag: TagRecord }>(
      "POST",
      `/interfaces/${encodeURIComponent(interfaceId)}/tags/allocate`
    );
    return result.tag;
  }

  async reserveTag(interfaceId: string, tag: TagRecord): Promise<TagRecord> {
    const result = await this.request<{ tag: TagRecord }>(
      "POST",
      `/interfaces/${encodeURIComponent(interfaceId)}/tags/reserve`,
      tag
    );
    return result.tag;
  }

  async releaseTag(interfaceId: string, tag: TagRecord): Promise<TagRecord> {
    const result = await this.request<{ tag: TagRecord }>(
      "POST",
      `/interfaces/${encodeURIComponent(interfaceId)}/tags/release`,
      tag
    );
    return result.tag;
  }

  async provisionUni(interfaceId: string, tag?: TagRecord): Promise<UniRecord> {
    const result = await this.request<{ uni: UniRecord }>(
      "POST",
      `/interfaces/${encodeURIComponent(interfaceId)}/uni`,
      tag ? { tag } : {}
    );
    return result.uni;
  }

  // Health
  async health(): Promise<{ status: string }> {
    return this.request<{ status: string }>("GET", "/health");
  }

  // Stats
  async stats(): Promise<TopologyStats> {
    return this.request<TopologyStats>("GET", "/stats");
  }
}

let client: ApiClient | null = null;

export function getApiClient(): ApiClient {
  if (!client) {
    const baseUrl = process.env.API_URL || "http://localhost:3000";
    client = new ApiClient({ baseUrl });
  }
  return client;
}
