import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { ANALYSIS_UNAVAILABLE } from '../analysis/analysis.types';
import { LlmService } from '../analysis/llm.service';
import { RANDOM_SOURCE } from '../utils/random';
import { UpstreamTimeoutError } from '../utils/upstream-error';
import { WeatherService } from '../weather/weather.service';
import { AgentsController } from './agents.controller';
import { AgentsService } from './agents.service';
import { ChatController } from './chat.controller';
import { SmartHomeAgent } from './smart-home.agent';
import { TimeService } from './time.service';
import { WeatherAgent } from './weather.agent';

describe('Agent endpoints (e2e)', () => {
  let app: INestApplication;
  const llmService = { model: 'test-model', generate: jest.fn() };
  const weatherService = { getWeather: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();

    const moduleRef = await Test.createTestingModule({
      controllers: [AgentsController, ChatController],
      providers: [
        AgentsService,
        SmartHomeAgent,
        WeatherAgent,
        TimeService,
        { provide: RANDOM_SOURCE, useValue: () => 0.5 },
        { provide: WeatherService, useValue: weatherService },
        { provide: LlmService, useValue: llmService },
      ],
    }).compile();

    app = moduleRef.createNestApplication();
    app.useGlobalPipes(
      new ValidationPipe({
        transform: true,
        transformOptions: { enableImplicitConversion: true },
        whitelist: true,
      }),
    );
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /agents lists the registered agents', async () => {
    const response = await request(app.getHttpServer()).get('/agents').expect(200);

    expect(response.body.map((agent: { id: string }) => agent.id)).toEqual([
      'smart-home',
      'weather',
    ]);
  });

  it('POST /agents/:agentId/messages replies with an agent message', async () => {
    const response = await request(app.getHttpServer())
      .post('/agents/smart-home/messages')
      .send({ text: 'turn on the lights' })
      .expect(200);

    expect(response.body).toEqual({
      intent: 'switch-light',
      message: {
        role: 'agent',
        text: 'The lights are now on.',
        sender: 'smart-home',
        recipient: 'http-client',
      },
    });
  });

  it('POST /agents/:agentId/messages keeps the caller as recipient', async () => {
    const response = await request(app.getHttpServer())
      .post('/agents/weather/messages')
      .send({ text: 'hello', sender: 'weather-ui' })
      .expect(200);

    expect(response.body.message.recipient).toBe('weather-ui');
  });

  it('POST /agents/:agentId/messages is 404 for unknown agents', async () => {
    const response = await request(app.getHttpServer())
      .post('/agents/garage/messages')
      .send({ text: 'open' })
      .expect(404);

    expect(response.body.message).toBe('Agent not found: garage');
  });

  it('POST /agents/:agentId/messages requires text', async () => {
    await request(app.getHttpServer())
      .post('/agents/smart-home/messages')
      .send({})
      .expect(400);
  });

  it('GET /chat forwards the prompt', async () => {
    llmService.generate.mockResolvedValue('Once upon a time.');

    const response = await request(app.getHttpServer())
      .get('/chat?prompt=hello')
      .expect(200);

    expect(llmService.generate).toHaveBeenCalledWith('hello');
    expect(response.body).toEqual({
      model: 'test-model',
      prompt: 'hello',
      response: 'Once upon a time.',
    });
  });

  it('GET /chat falls back when the model is unreachable', async () => {
    llmService.generate.mockRejectedValue(
      new UpstreamTimeoutError('llm', 'llm request timed out'),
    );

    const response = await request(app.getHttpServer()).get('/chat').expect(200);

    expect(response.body).toEqual({
      model: 'test-model',
      prompt: 'tell me a short story',
      response: ANALYSIS_UNAVAILABLE,
      error: 'llm request timed out',
    });
  });
});
