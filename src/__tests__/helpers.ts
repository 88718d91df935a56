import axios, { type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { createLogger } from "../logger.js";
import type { PostRecord } from "../types.js";

export const silentLogger = () => createLogger("silent");

export interface StubReply {
  status: number;
  data?: unknown;
}

/** An axios instance whose requests never leave the process. */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>): AxiosInstance {
  const adapter: AxiosAdapter = async (config) => {
    const reply = await handler(config);
    return {
      status: reply.status,
      statusText: String(reply.status),
      data: reply.data ?? "",
      headers: {},
      config,
    };
  };
  return axios.create({ adapter });
}

export function post(id: string, timestamp: string, content = `post ${id}`): PostRecord {
  return { id, content, timestamp, link: `https://social.example/@someone/${id}` };
}
