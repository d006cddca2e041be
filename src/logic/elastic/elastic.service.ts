import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export class ElasticRequestError extends Error {
    constructor(readonly status: number, readonly body: string) {
        super(`Elasticsearch error ${status}: ${body}`);
        this.name = 'ElasticRequestError';
    }

    get indexMissing(): boolean {
        return this.status === 404 && this.body.includes('index_not_found_exception');
    }
}

@Injectable()
export class ElasticService {
    private readonly headers: Record<string, string>;
    private readonly esUrl: string;
    constructor(private readonly configService: ConfigService) {
        this.esUrl = this.configService.get<string>('ELASTIC_URL') || 'http://localhost:9200';
        const esKey = this.configService.get<string>('ELASTIC_API_KEY') || '';
        this.headers = {
            'Content-Type': 'application/json',
            ...(esKey ? { 'Authorization': `APIKey ${esKey}` } : {})
        }

    }

    async elasticPost(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method: "POST",
            headers: this.headers,
            body: JSON.stringify(body),
            signal
        });
        if (!resp.ok) {
            throw new ElasticRequestError(resp.status, await resp.text());
        }
        return resp.json();
    }
}
