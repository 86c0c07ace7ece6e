import type {
  BedResult,
  CustomHabitRequest,
  HabitResult,
  HydrationResult,
  PredefinedHabitType,
  SunlightResult,
  VideoRequest,
  VideoResult,
} from './types.js';

export interface VerificationClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class VerificationRequestError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'VerificationRequestError';
    this.status = status;
  }
}

function errorField(text: string): string | undefined {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return undefined;
}

export class VerificationClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: VerificationClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async verifyBed(imageBase64: string): Promise<BedResult> {
    return this.post<BedResult>('verifyBed', { imageBase64 });
  }

  async verifySunlight(imageBase64: string): Promise<SunlightResult> {
    return this.post<SunlightResult>('verifySunlight', { imageBase64 });
  }

  async verifyHydration(imageBase64: string): Promise<HydrationResult> {
    return this.post<HydrationResult>('verifyHydration', { imageBase64 });
  }

  async verifyCustomHabit(payload: CustomHabitRequest): Promise<HabitResult> {
    return this.post<HabitResult>('verifyCustomHabit', payload);
  }

  async verifyVideo(payload: VideoRequest): Promise<VideoResult> {
    if (payload.frames.length === 0) {
      throw new Error('at least one frame is required');
    }
    return this.post<VideoResult>('verifyVideo', payload);
  }

  async verifyPredefinedHabit(imageBase64: string, habitType: PredefinedHabitType): Promise<HabitResult> {
    return this.post<HabitResult>('verifyPredefinedHabit', { imageBase64, habitType });
  }

  private async post<T>(endpoint: string, payload: unknown): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}/${endpoint}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const message = await this.readErrorMessage(response);
      throw new VerificationRequestError(`${endpoint} failed with ${response.status}: ${message}`, response.status);
    }

    return (await response.json()) as T;
  }

  private async readErrorMessage(response: Response): Promise<string> {
    try {
      const text = await response.text();
      if (!text) {
        return '<empty>';
      }
      return errorField(text) ?? text;
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
