import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { TaskApiPort } from '../../../application/ports/output/task-api.port';
import { AppConfig } from '../../../config/configuration';
import { TaskDocument, WorkTask } from '../../../domain/entities/work-task.entity';
import { SessionCredentialVO } from '../../../domain/value-objects/session-credential.vo';
import { RemoteError, describeError } from '../../../domain/errors';
import { HttpClientService } from '../../../shared/http/http-client.service';

const documentSchema = z.object({
  ID: z.string().min(1),
  name: z.string().nullish(),
  description: z.string().nullish(),
});

const taskSchema = z.object({
  ID: z.string().min(1),
  name: z.string().nullish(),
  status: z.string(),
  hasDocuments: z.boolean().nullish(),
  documents: z.array(documentSchema).nullish(),
});

const searchResponseSchema = z.object({
  data: z.array(taskSchema),
});

const errorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

type WireTask = z.infer<typeof taskSchema>;

/**
 * Workfront Task API Adapter
 * Implements TaskApiPort over the Workfront REST API (`/attask/api/{version}`).
 * Search and update calls carry the API key; downloads carry the session id.
 */
@Injectable()
export class WorkfrontTaskApiAdapter implements TaskApiPort {
  private readonly logger = new Logger(WorkfrontTaskApiAdapter.name);
  private readonly baseUrl: string;
  private readonly apiBaseUrl: string;
  private readonly apiKey: string;

  constructor(
    private readonly httpClient: HttpClientService,
    configService: ConfigService<AppConfig, true>,
  ) {
    const workfront = configService.get('workfront', { infer: true });

    this.baseUrl = workfront.baseUrl;
    this.apiBaseUrl = `${workfront.baseUrl}/attask/api/${workfront.apiVersion}`;
    this.apiKey = workfront.apiKey;
  }

  async searchTasks(
    statusCode: string,
    limit: number,
    includeDocuments: boolean,
  ): Promise<WorkTask[]> {
    const fields = includeDocuments ? 'fields=*,documents' : 'fields=*';
    const params = `${fields}&isComplete=false&$$LIMIT=${limit}&status_Sort=desc&status=${encodeURIComponent(statusCode)}`;
    const url = `${this.apiBaseUrl}/TASK/search?${params}`;

    const response = await this.send('Task search', () =>
      this.httpClient.get(url, { headers: this.apiHeaders() }),
    );
    this.ensureSuccess('Task search', response.statusCode, response.body);

    const parsed = searchResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new RemoteError(
        `Task search returned an unexpected payload: ${parsed.error.errors
          .map((e) => `${e.path.join('.')}: ${e.message}`)
          .join('; ')}`,
        response.statusCode,
      );
    }

    const tasks = parsed.data.data.map((task) => this.toWorkTask(task));
    this.logger.log(`Task search for status '${statusCode}' returned ${tasks.length} tasks`);
    return tasks;
  }

  async fetchDocumentBytes(documentId: string, credential: SessionCredentialVO): Promise<Buffer> {
    const url = `${this.baseUrl}/document/download?ID=${encodeURIComponent(documentId)}`;

    this.logger.debug(`Downloading document ${documentId}`);

    const response = await this.send(`Download of document ${documentId}`, () =>
      this.httpClient.download(url, { headers: { sessionID: credential.token } }),
    );
    this.ensureSuccess(`Download of document ${documentId}`, response.statusCode);

    this.logger.log(`Downloaded document ${documentId}`);
    return response.body;
  }

  async updateDocumentField(documentId: string, field: string, value: string): Promise<number> {
    const url = `${this.apiBaseUrl}/document/${encodeURIComponent(documentId)}`;

    this.logger.debug(`Updating document ${documentId} field '${field}'`);

    const response = await this.send(`Update of document ${documentId}`, () =>
      this.httpClient.put(url, { [field]: value }, { headers: this.apiHeaders() }),
    );
    this.ensureSuccess(`Update of document ${documentId}`, response.statusCode, response.body);

    this.logger.log(`Document ${documentId} updated successfully`);
    return response.statusCode;
  }

  async updateTaskStatus(taskId: string, statusCode: string): Promise<number> {
    const url = `${this.apiBaseUrl}/task/${encodeURIComponent(taskId)}`;

    this.logger.debug(`Updating task ${taskId} to status: ${statusCode}`);

    const response = await this.send(`Update of task ${taskId}`, () =>
      this.httpClient.put(url, { status: statusCode }, { headers: this.apiHeaders() }),
    );
    this.ensureSuccess(`Update of task ${taskId}`, response.statusCode, response.body);

    return response.statusCode;
  }

  private apiHeaders(): Record<string, string> {
    return { apiKey: this.apiKey };
  }

  private toWorkTask(task: WireTask): WorkTask {
    const documents: TaskDocument[] = (task.documents ?? []).map((document) => ({
      id: document.ID,
      name: document.name ?? undefined,
      description: document.description ?? undefined,
    }));

    return {
      id: task.ID,
      name: task.name ?? undefined,
      status: task.status,
      hasDocuments: task.hasDocuments ?? false,
      documents,
    };
  }

  /**
   * Runs one HTTP exchange, mapping transport failures to RemoteError.
   */
  private async send<T>(operation: string, exchange: () => Promise<T>): Promise<T> {
    try {
      return await exchange();
    } catch (error) {
      this.logger.error(`${operation} failed: ${describeError(error)}`);
      throw new RemoteError(`${operation} failed: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }
  }

  private ensureSuccess(operation: string, statusCode: number, body?: unknown): void {
    if (statusCode >= 200 && statusCode < 300) {
      return;
    }

    const parsedError = errorResponseSchema.safeParse(body);
    const detail = parsedError.success ? `: ${parsedError.data.error.message}` : '';

    this.logger.error(`${operation} failed with HTTP ${statusCode}${detail}`);
    throw new RemoteError(`${operation} failed with HTTP ${statusCode}${detail}`, statusCode);
  }
}
