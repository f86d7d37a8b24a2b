import axios, { type AxiosInstance } from "axios";
import { HTTP_TIMEOUT_MS, USER_AGENT } from "./env";
import { sleep } from "./utils";

export function createHttp(): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/json",
    },
    timeout: HTTP_TIMEOUT_MS,
  });
}

export const http = createHttp();

const MAX_ATTEMPTS = 3;

export async function getJson(
  client: AxiosInstance,
  url: string,
  params: Record<string, string | number>,
  attempt = 1
): Promise<unknown> {
  try {
    const res = await client.get<unknown>(url, { params, responseType: "json" });
    return res.data;
  } catch (err) {
    const status = axios.isAxiosError(err) ? err.response?.status : undefined;
    if (attempt < MAX_ATTEMPTS && axios.isAxiosError(err) && (!status || status >= 500)) {
      await sleep(500 * 2 ** (attempt - 1));
      return getJson(client, url, params, attempt + 1);
    }
    throw err;
  }
}
