import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { BadGatewayException, UnprocessableEntityException } from '@nestjs/common';
import { AxiosError } from 'axios';
import { of, throwError } from 'rxjs';
import { EventImportService, parseEventTime } from './event-import.service';
import { LlmService } from '../llm/llm.service';
import { LlmUnavailableError } from '../llm/llm.errors';

const PAGE = `<html><head><style>body { color: red; }</style></head>
<body><h1>Data Summit</h1><p>Join us on March 10 at 15:00 UTC.</p></body></html>`;

describe('parseEventTime', () => {
  it('should treat a plain date-time as UTC', () => {
    expect(parseEventTime('2026-03-10 15:00:00')?.toISOString()).toBe('2026-03-10T15:00:00.000Z');
  });

  it('should accept minutes without seconds', () => {
    expect(parseEventTime('2026-03-10 15:00')?.toISOString()).toBe('2026-03-10T15:00:00.000Z');
  });

  it('should honour an explicit offset', () => {
    expect(parseEventTime('2026-03-10T17:00:00+02:00')?.toISOString()).toBe('2026-03-10T15:00:00.000Z');
  });

  it('should return null for garbage', () => {
    expect(parseEventTime('next tuesday')).toBeNull();
  });
});

describe('EventImportService', () => {
  let service: EventImportService;
  let httpService: { get: jest.Mock };
  let llmService: { complete: jest.Mock };

  beforeEach(async () => {
    httpService = { get: jest.fn().mockReturnValue(of({ data: PAGE })) };
    llmService = {
      complete: jest
        .fn()
        .mockResolvedValue(
          '```json\n{"name": "Data Summit", "description": " Pipelines at scale ", "event_time": "2026-03-10 15:00:00"}\n```',
        ),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventImportService,
        { provide: HttpService, useValue: httpService },
        { provide: LlmService, useValue: llmService },
      ],
    }).compile();

    service = module.get<EventImportService>(EventImportService);
  });

  it('should turn a page into an event draft', async () => {
    const draft = await service.importFromUrl('https://example.com/summit');

    expect(draft).toEqual({
      name: 'Data Summit',
      description: 'Pipelines at scale',
      eventTime: '2026-03-10T15:00:00.000Z',
      sourceUrl: 'https://example.com/summit',
    });
  });

  it('should send the page text, not the markup, to the model', async () => {
    await service.importFromUrl('https://example.com/summit');

    const request = llmService.complete.mock.calls[0][0];
    expect(request.json).toBe(true);
    expect(request.prompt).toContain('### Webpage Text to Analyze\nData Summit\nJoin us on March 10 at 15:00 UTC.\n\n');
    expect(request.prompt).not.toContain('color: red');
  });

  it('should default a missing description to an empty string', async () => {
    llmService.complete.mockResolvedValue('{"name": "Data Summit", "description": null, "event_time": "2026-03-10 15:00"}');

    const draft = await service.importFromUrl('https://example.com/summit');

    expect(draft.description).toBe('');
  });

  it('should reject output without a usable start time', async () => {
    llmService.complete.mockResolvedValue('{"name": "Data Summit", "description": "x", "event_time": null}');

    await expect(service.importFromUrl('https://example.com/summit')).rejects.toThrow(
      UnprocessableEntityException,
    );
  });

  it('should reject output that is not JSON', async () => {
    llmService.complete.mockResolvedValue('I could not find an event.');

    await expect(service.importFromUrl('https://example.com/summit')).rejects.toThrow(
      'Could not extract valid event details from the page',
    );
  });

  it('should reject a page without text', async () => {
    httpService.get.mockReturnValue(of({ data: '<html><script>var x = 1;</script></html>' }));

    await expect(service.importFromUrl('https://example.com/empty')).rejects.toThrow(
      UnprocessableEntityException,
    );
    expect(llmService.complete).not.toHaveBeenCalled();
  });

  it('should map fetch failures to BadGateway', async () => {
    httpService.get.mockReturnValue(throwError(() => new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED')));

    await expect(service.importFromUrl('https://example.com/down')).rejects.toThrow(BadGatewayException);
  });

  it('should map an unavailable model to BadGateway', async () => {
    llmService.complete.mockRejectedValue(new LlmUnavailableError('OpenAI API key not configured'));

    await expect(service.importFromUrl('https://example.com/summit')).rejects.toThrow(
      'Event extraction unavailable: OpenAI API key not configured',
    );
  });
});
