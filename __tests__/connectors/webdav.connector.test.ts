import axios, {
  AxiosAdapter,
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";
import { describe, expect, it } from "vitest";
import { WebDavStorageConnector } from "../../src/connectors/webdav.connector";
import { NetworkError, StorageError } from "../../src/errors/sync.errors";
import { createSilentLogger } from "../../src/utils/logger";

interface RecordedRequest {
  method: string;
  url: string;
  depth?: string;
  data?: unknown;
}

type Route = (config: InternalAxiosRequestConfig) => { status: number; data?: unknown };

const BACKUP = "clinic-1_2024-03-01T10-00-00.000Z.enc";

const MULTISTATUS = `<?xml version="1.0" encoding="utf-8"?>
<d:multistatus xmlns:d="DAV:">
  <d:response>
    <d:href>/clinic-backups/</d:href>
    <d:propstat>
      <d:prop><d:resourcetype><d:collection/></d:resourcetype></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>/clinic-backups/${BACKUP}</d:href>
    <d:propstat>
      <d:prop>
        <d:getcontentlength>2048</d:getcontentlength>
        <d:getlastmodified>Fri, 01 Mar 2024 10:00:05 GMT</d:getlastmodified>
        <d:resourcetype/>
      </d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>/clinic-backups/notes%20v2.txt</d:href>
    <d:propstat>
      <d:prop><d:resourcetype/></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
</d:multistatus>`;

/**
 * WebDAV server stand-in plugged in as the axios adapter
 */
const createServer = (routes: Record<string, Route>) => {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? "get").toUpperCase();
    const url = config.url ?? "";
    const depth = config.headers.get("Depth");
    requests.push({
      method,
      url,
      depth: depth === undefined || depth === null ? undefined : String(depth),
      data: config.data,
    });

    const route = routes[`${method} ${url}`];
    if (!route) {
      throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
    }

    const { status, data } = route(config);
    const response: AxiosResponse = {
      data: data ?? "",
      status,
      statusText: String(status),
      headers: {},
      config,
    };
    const validateStatus = config.validateStatus;
    if (validateStatus && !validateStatus(status)) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response,
      );
    }
    return response;
  };

  const connector = new WebDavStorageConnector(
    { endpoint: "http://webdav.test", basePath: "/clinic-backups/" },
    createSilentLogger(),
    axios.create({ baseURL: "http://webdav.test", adapter }),
  );
  return { connector, requests };
};

const folderReady: Record<string, Route> = {
  "MKCOL /clinic-backups/": () => ({ status: 201 }),
};

describe("WebDavStorageConnector", () => {
  it("creates the folder once, then uploads by name", async () => {
    const { connector, requests } = createServer({
      ...folderReady,
      [`PUT /clinic-backups/${BACKUP}`]: () => ({ status: 201 }),
      "PUT /clinic-backups/second%20file.enc": () => ({ status: 201 }),
    });

    expect(await connector.upload(BACKUP, Buffer.from("payload"))).toBe(BACKUP);
    await connector.upload("second file.enc", Buffer.from("payload"));

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "MKCOL /clinic-backups/",
      `PUT /clinic-backups/${BACKUP}`,
      "PUT /clinic-backups/second%20file.enc",
    ]);
  });

  it("treats an existing folder as ready", async () => {
    const { connector } = createServer({
      "MKCOL /clinic-backups/": () => ({ status: 405 }),
      [`DELETE /clinic-backups/${BACKUP}`]: () => ({ status: 204 }),
    });
    await expect(connector.delete(BACKUP)).resolves.toBeUndefined();
  });

  it("lists files from a PROPFIND response, skipping collections", async () => {
    const { connector, requests } = createServer({
      ...folderReady,
      "PROPFIND /clinic-backups/": () => ({ status: 207, data: MULTISTATUS }),
    });

    expect(await connector.list()).toEqual([
      {
        id: BACKUP,
        name: BACKUP,
        size: 2048,
        modifiedAt: new Date("2024-03-01T10:00:05.000Z"),
      },
      { id: "notes v2.txt", name: "notes v2.txt", size: 0, modifiedAt: new Date(0) },
    ]);
    expect(requests[1].depth).toBe("1");
    expect((await connector.latest())?.name).toBe(BACKUP);
  });

  it("reads properties from the successful propstat", async () => {
    const { connector } = createServer({
      ...folderReady,
      "PROPFIND /clinic-backups/": () => ({
        status: 207,
        data: `<d:multistatus xmlns:d="DAV:">
  <d:response>
    <d:href>/clinic-backups/${BACKUP}</d:href>
    <d:propstat>
      <d:prop><d:getcontentlength/><d:getlastmodified/></d:prop>
      <d:status>HTTP/1.1 404 Not Found</d:status>
    </d:propstat>
    <d:propstat>
      <d:prop>
        <d:getcontentlength>512</d:getcontentlength>
        <d:getlastmodified>Fri, 01 Mar 2024 10:00:05 GMT</d:getlastmodified>
        <d:resourcetype/>
      </d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
</d:multistatus>`,
      }),
    });

    expect(await connector.list()).toEqual([
      {
        id: BACKUP,
        name: BACKUP,
        size: 512,
        modifiedAt: new Date("2024-03-01T10:00:05.000Z"),
      },
    ]);
  });

  it("lists an empty folder", async () => {
    const { connector } = createServer({
      ...folderReady,
      "PROPFIND /clinic-backups/": () => ({
        status: 207,
        data: '<d:multistatus xmlns:d="DAV:"></d:multistatus>',
      }),
    });
    expect(await connector.list()).toEqual([]);
  });

  it("rejects responses that are not a multistatus document", async () => {
    const { connector } = createServer({
      ...folderReady,
      "PROPFIND /clinic-backups/": () => ({ status: 207, data: "<html>maintenance</html>" }),
    });
    await expect(connector.list()).rejects.toMatchObject({ code: "INTEGRITY_CORRUPTED_DATA" });
  });

  it("downloads file contents", async () => {
    const { connector } = createServer({
      ...folderReady,
      [`GET /clinic-backups/${BACKUP}`]: () => ({ status: 200, data: Buffer.from("sealed") }),
    });
    expect((await connector.download(BACKUP)).toString()).toBe("sealed");
  });

  it("maps missing files to not found", async () => {
    const { connector } = createServer({
      ...folderReady,
      "GET /clinic-backups/missing.enc": () => ({ status: 404 }),
    });
    const error = await connector.download("missing.enc").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ code: "STORAGE_NOT_FOUND" });
  });

  it("maps refused connections to network errors", async () => {
    const { connector } = createServer({});
    const error = await connector.list().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: "NETWORK_CONNECTION_REFUSED" });
  });

  it("maps auth failures", async () => {
    const { connector } = createServer({ "MKCOL /clinic-backups/": () => ({ status: 401 }) });
    await expect(connector.upload(BACKUP, Buffer.from("x"))).rejects.toMatchObject({
      code: "AUTH_TOKEN_EXPIRED",
    });
  });
});
