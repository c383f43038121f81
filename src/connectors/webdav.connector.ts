import { AxiosInstance } from "axios";
import { Parser, processors } from "xml2js";
import { z } from "zod";
import type { Logger } from "winston";
import { IntegrityError } from "../errors/sync.errors";
import {
  BaseStorageConnector,
  RemoteFileDescriptor,
  StorageConfig,
} from "./base-connector";

const PROPFIND_BODY = `<?xml version="1.0" encoding="utf-8"?>
<d:propfind xmlns:d="DAV:">
  <d:prop>
    <d:getcontentlength/>
    <d:getlastmodified/>
    <d:resourcetype/>
  </d:prop>
</d:propfind>`;

// Elements carrying attributes parse to { _: text, $: attrs }
const text = z.union([
  z.string(),
  z.object({ _: z.string() }).transform((node) => node._),
]);

const propSchema = z.object({
  getcontentlength: text.optional(),
  getlastmodified: text.optional(),
  resourcetype: z.unknown().optional(),
});

const propstatSchema = z.object({ prop: propSchema, status: text.optional() });

const responseSchema = z.object({
  href: text,
  propstat: z.union([propstatSchema, z.array(propstatSchema)]),
});

const multistatusSchema = z.object({
  multistatus: z
    .object({
      response: z.union([responseSchema, z.array(responseSchema)]).optional(),
    })
    .or(z.literal("")),
});

type PropfindResponse = z.infer<typeof responseSchema>;
type Propstat = z.infer<typeof propstatSchema>;

// "HTTP/1.1 200 OK"
const SUCCESS_STATUS = /\s2\d\d(\s|$)/;

const asArray = <T>(value: T | T[] | undefined): T[] =>
  value === undefined ? [] : Array.isArray(value) ? value : [value];

const isCollection = (resourcetype: unknown): boolean =>
  typeof resourcetype === "object" &&
  resourcetype !== null &&
  "collection" in resourcetype;

/**
 * WebDAV connector. Blobs live as flat files under the configured folder;
 * the remote id is the file name.
 */
export class WebDavStorageConnector extends BaseStorageConnector {
  private parser: Parser;
  private readonly folder: string;

  constructor(config: StorageConfig, logger: Logger, httpClient?: AxiosInstance) {
    super(config, logger, httpClient);
    this.folder = `/${config.basePath.replace(/^\/+|\/+$/g, "")}`;
    this.parser = new Parser({
      explicitArray: false,
      tagNameProcessors: [processors.stripPrefix],
    });
  }

  getName(): string {
    return "WebDAV";
  }

  protected async prepare(): Promise<void> {
    // 405: the folder already exists
    await this.httpClient.request({
      method: "MKCOL",
      url: `${this.folder}/`,
      validateStatus: (status) => (status >= 200 && status < 300) || status === 405,
    });
    this.logger.debug("WebDAV folder ready", { folder: this.folder });
  }

  protected async uploadFile(name: string, data: Buffer): Promise<string> {
    await this.httpClient.put(this.pathOf(name), data, {
      headers: { "Content-Type": "application/octet-stream" },
    });
    this.logger.info("Uploaded file to WebDAV", { name, bytes: data.length });
    return name;
  }

  protected async downloadFile(id: string): Promise<Buffer> {
    const response = await this.httpClient.get<ArrayBuffer>(this.pathOf(id), {
      responseType: "arraybuffer",
    });
    return Buffer.from(response.data);
  }

  protected async listFiles(): Promise<RemoteFileDescriptor[]> {
    const response = await this.httpClient.request<string>({
      method: "PROPFIND",
      url: `${this.folder}/`,
      data: PROPFIND_BODY,
      headers: { Depth: "1", "Content-Type": "application/xml; charset=utf-8" },
      responseType: "text",
    });

    const raw: unknown = await this.parser.parseStringPromise(response.data);
    const parsed = multistatusSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntegrityError("corruptedData", {
        message: "Unexpected PROPFIND response from WebDAV server",
      });
    }

    const responses =
      parsed.data.multistatus === "" ? [] : asArray(parsed.data.multistatus.response);

    return responses
      .map((entry) => this.toDescriptor(entry))
      .filter((file): file is RemoteFileDescriptor => file !== undefined);
  }

  protected async deleteFile(id: string): Promise<void> {
    await this.httpClient.delete(this.pathOf(id));
    this.logger.info("Deleted file from WebDAV", { id });
  }

  private toDescriptor(entry: PropfindResponse): RemoteFileDescriptor | undefined {
    // Properties the server could not return come in a separate 404 propstat
    const prop = asArray<Propstat>(entry.propstat).find(
      (propstat) => propstat.status === undefined || SUCCESS_STATUS.test(propstat.status),
    )?.prop;
    if (!prop || isCollection(prop.resourcetype)) return undefined;

    const segments = entry.href.split("/").filter((segment) => segment.length > 0);
    const last = segments[segments.length - 1];
    if (!last) return undefined;

    const name = decodeURIComponent(last);
    const modified = prop.getlastmodified ? new Date(prop.getlastmodified) : undefined;

    return {
      id: name,
      name,
      size: Number(prop.getcontentlength ?? 0),
      modifiedAt:
        modified && !Number.isNaN(modified.getTime()) ? modified : new Date(0),
    };
  }

  private pathOf(name: string): string {
    return `${this.folder}/${encodeURIComponent(name)}`;
  }
}
