import { PipelineController, PipelineSettings } from '../../src/engine/pipeline-controller';
import { RetryPolicy } from '../../src/engine/retry';
import { TaskRegistry } from '../../src/engine/task-registry';
import {
  CodeGenerationClient,
  GenerationChain,
  GenerationError,
  GenerationRequest,
} from '../../src/collaborators/code-generation';
import { InMemoryRepositoryHost } from '../../src/collaborators/in-memory-host';
import { TemplateCodeGenerator } from '../../src/collaborators/template-generator';
import { ProvisionError, RepositoryProvisioner } from '../../src/collaborators/repository';
import { PagesPublisher, PublishError } from '../../src/collaborators/pages';
import { encodeDataUri } from '../../src/attachments/codec';
import { ArtifactSet, createArtifactSet } from '../../src/domain/artifact';
import { NotificationPayload } from '../../src/domain/notification';
import { PipelineResult, PipelineSuccess, PipelineFailure } from '../../src/domain/pipeline';
import { RepositoryHandle } from '../../src/domain/repository';
import { Round, TaskRequest, toAttachment } from '../../src/domain/task';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';

const SECRET = 'test-secret';
const CALLBACK = 'https://evaluator.example.com/notify';

function fastPolicy(maxAttempts: number): RetryPolicy {
  return new RetryPolicy({
    baseDelayMs: 1,
    multiplier: 2,
    maxAttempts,
    maxDelayMs: 10,
    jitter: 0,
    isRetryable: () => false,
    sleep: async () => undefined,
  });
}

function taskRequest(overrides: Partial<TaskRequest> = {}): TaskRequest {
  return {
    email: 'student@example.com',
    secret: SECRET,
    taskId: 't1',
    round: Round.Build,
    nonce: 'nonce-1',
    brief: 'hello world page',
    checks: ['has license'],
    callbackUrl: CALLBACK,
    attachments: [],
    ...overrides,
  };
}

interface HarnessOptions {
  generators?: CodeGenerationClient[];
  provisioner?: RepositoryProvisioner;
  publisher?: PagesPublisher;
  settings?: Partial<PipelineSettings>;
}

function createHarness(options: HarnessOptions = {}) {
  const host = new InMemoryRepositoryHost();
  const registry = new TaskRegistry();
  const deliver = jest.fn<void, [string, NotificationPayload, string]>();
  const generation = new GenerationChain(options.generators ?? [new TemplateCodeGenerator()], {
    retryPolicy: fastPolicy(2),
    timeoutMs: 1000,
  });
  const controller = new PipelineController(
    {
      registry,
      generation,
      provisioner: options.provisioner ?? host,
      publisher: options.publisher ?? host,
      notifications: { deliver },
    },
    {
      sharedSecret: SECRET,
      provisionRetryPolicy: fastPolicy(3),
      ...options.settings,
    },
  );
  return { controller, host, registry, deliver };
}

/** Provisioner whose createAndPush is scripted; everything else goes to the host. */
function scriptedProvisioner(host: InMemoryRepositoryHost) {
  const createAndPush = jest.fn<Promise<RepositoryHandle>, [string, ArtifactSet]>();
  const provisioner: RepositoryProvisioner = {
    createAndPush,
    locateAndPush: (taskId, artifacts) => host.locateAndPush(taskId, artifacts),
    locate: (taskId) => host.locate(taskId),
    readArtifacts: (handle) => host.readArtifacts(handle),
  };
  return { provisioner, createAndPush };
}

function expectSuccess(result: PipelineResult): PipelineSuccess {
  if (result.outcome !== 'success') {
    throw new Error(`Expected success, got ${result.stage}/${result.kind}: ${result.error.message}`);
  }
  return result;
}

function expectFailure(result: PipelineResult): PipelineFailure {
  if (result.outcome !== 'failure') {
    throw new Error('Expected failure, got success');
  }
  return result;
}

describe('PipelineController', () => {
  beforeEach(() => setLogHandler(() => undefined));
  afterEach(() => resetLogHandler());

  describe('build', () => {
    it('creates, publishes and notifies once with the request nonce', async () => {
      const { controller, host, deliver, registry } = createHarness();

      const result = expectSuccess(await controller.run(taskRequest()));

      expect(result.repositoryUrl).toBe('https://git.local/pagewright/t1');
      expect(result.pagesUrl).toBe('https://pagewright.pages.local/t1/');
      expect(result.commitSha).toMatch(/^[0-9a-f]{40}$/);
      expect(result.degraded).toBe(false);
      expect(result.warnings).toEqual([]);
      expect(host.getCommits('t1')[0].sha).toBe(result.commitSha);

      expect(deliver).toHaveBeenCalledTimes(1);
      expect(deliver).toHaveBeenCalledWith(
        CALLBACK,
        {
          status: 'success',
          message: 'Repository created and published',
          repo_url: 'https://git.local/pagewright/t1',
          pages_url: 'https://pagewright.pages.local/t1/',
          commit_sha: result.commitSha,
          degraded: false,
          warnings: [],
          email: 'student@example.com',
          task: 't1',
          round: 1,
          nonce: 'nonce-1',
        },
        'nonce-1',
      );
      expect(registry.isInFlight('t1')).toBe(false);
    });

    it('rejects a concurrent request for the same task', async () => {
      const { controller, deliver } = createHarness();

      const first = controller.run(taskRequest());
      const second = expectFailure(await controller.run(taskRequest({ nonce: 'nonce-2' })));

      expect(second.stage).toBe('Admission');
      expect(second.kind).toBe('AdmissionError');
      expect(second.error.code).toBe('ADMISSION.IN_FLIGHT');

      expectSuccess(await first);
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(deliver.mock.calls[0][2]).toBe('nonce-1');
    });

    it('admits the task again once the first run finishes', async () => {
      const { controller } = createHarness();

      expectSuccess(await controller.run(taskRequest()));
      const again = expectSuccess(await controller.run(taskRequest({ nonce: 'nonce-2' })));

      expect(again.repositoryUrl).toBe('https://git.local/pagewright/t1-2');
    });

    it('degrades when publishing fails after the push', async () => {
      const publisher: PagesPublisher = {
        publish: jest.fn<Promise<string>, [RepositoryHandle]>().mockRejectedValue(new PublishError('pages disabled')),
      };
      const { controller, deliver } = createHarness({ publisher });

      const result = expectSuccess(await controller.run(taskRequest()));

      expect(result.pagesUrl).toBeNull();
      expect(result.degraded).toBe(true);
      expect(result.repositoryUrl).toBe('https://git.local/pagewright/t1');
      expect(result.warnings).toEqual(['Publishing failed: pages disabled']);
      expect(deliver.mock.calls[0][1]).toMatchObject({ status: 'success', pages_url: null, degraded: true });
    });

    it('degrades when the publisher rejects with an unexpected error', async () => {
      const entries: LogEntry[] = [];
      setLogHandler((entry) => entries.push(entry));
      const publisher: PagesPublisher = {
        publish: jest.fn<Promise<string>, [RepositoryHandle]>().mockRejectedValue(new TypeError('fetch failed')),
      };
      const { controller, host } = createHarness({ publisher });

      const result = expectSuccess(await controller.run(taskRequest()));

      expect(result.pagesUrl).toBeNull();
      expect(result.degraded).toBe(true);
      expect(result.warnings).toEqual(['Publishing failed: Static site host request failed']);
      expect(host.listRepositories()).toEqual(['t1']);
      expect(entries.find((e) => e.message === 'Publisher raised an unexpected error')?.context).toMatchObject({
        error: 'TypeError: fetch failed',
      });
    });

    it('degrades when publishing times out', async () => {
      const publisher: PagesPublisher = {
        publish: () => new Promise<string>(() => undefined),
      };
      const { controller } = createHarness({ publisher, settings: { publishTimeoutMs: 10 } });

      const result = expectSuccess(await controller.run(taskRequest()));

      expect(result.pagesUrl).toBeNull();
      expect(result.degraded).toBe(true);
      expect(result.warnings).toEqual(['Publishing failed: Publishing timed out after 10ms']);
    });

    it('fails at Published when the publish policy is fail', async () => {
      const publisher: PagesPublisher = {
        publish: jest.fn<Promise<string>, [RepositoryHandle]>().mockRejectedValue(new PublishError('pages disabled')),
      };
      const { controller, host } = createHarness({ publisher, settings: { publishFailurePolicy: 'fail' } });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(result.stage).toBe('Published');
      expect(result.kind).toBe('PublishError');
      expect(result.error.code).toBe('PUBLISH.FAILED');
      expect(host.listRepositories()).toEqual(['t1']);
    });

    it('retries rate-limited provisioning', async () => {
      const host = new InMemoryRepositoryHost();
      const { provisioner, createAndPush } = scriptedProvisioner(host);
      createAndPush
        .mockRejectedValueOnce(new ProvisionError('RateLimited', 'secondary rate limit'))
        .mockImplementation((taskId, artifacts) => host.createAndPush(taskId, artifacts));
      const { controller } = createHarness({ provisioner, publisher: host });

      expectSuccess(await controller.run(taskRequest()));
      expect(createAndPush).toHaveBeenCalledTimes(2);
    });

    it('turns provisioning timeouts into NetworkFailure after the retries', async () => {
      const host = new InMemoryRepositoryHost();
      const { provisioner, createAndPush } = scriptedProvisioner(host);
      createAndPush.mockImplementation(() => new Promise<RepositoryHandle>(() => undefined));
      const { controller } = createHarness({ provisioner, publisher: host, settings: { provisionTimeoutMs: 10 } });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(createAndPush).toHaveBeenCalledTimes(3);
      expect(result.stage).toBe('RepositoryProvisioned');
      expect(result.kind).toBe('NetworkFailure');
      expect(result.error.message).toBe('Repository provisioning timed out after 10ms');
    });

    it('masks credentials in provisioning errors', async () => {
      const host = new InMemoryRepositoryHost();
      const { provisioner, createAndPush } = scriptedProvisioner(host);
      createAndPush.mockRejectedValue(
        new ProvisionError('AuthenticationRejected', 'Bad credentials for token test-token-value'),
      );
      const { controller, deliver } = createHarness({
        provisioner,
        publisher: host,
        settings: { maskedSecrets: ['test-token-value'] },
      });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(createAndPush).toHaveBeenCalledTimes(1);
      expect(result.kind).toBe('AuthenticationRejected');
      expect(result.error.code).toBe('PROVISION.AUTHENTICATION_REJECTED');
      expect(result.error.message).toBe('Bad credentials for token ************alue');
      expect(deliver.mock.calls[0][1]).toMatchObject({
        status: 'error',
        message: 'Bad credentials for token ************alue',
        code: 'PROVISION.AUTHENTICATION_REJECTED',
      });
    });

    it('reports unexpected errors as InternalError without detail', async () => {
      const host = new InMemoryRepositoryHost();
      const { provisioner, createAndPush } = scriptedProvisioner(host);
      createAndPush.mockRejectedValue(new TypeError('Cannot read properties of undefined'));
      const { controller, registry } = createHarness({ provisioner, publisher: host });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(result.stage).toBe('RepositoryProvisioned');
      expect(result.kind).toBe('InternalError');
      expect(result.error.code).toBe('SYSTEM.INTERNAL');
      expect(result.error.message).toBe('Internal error while processing the task');
      expect(registry.inFlightCount()).toBe(0);
    });
  });

  describe('authentication', () => {
    it('rejects a wrong secret before any collaborator runs, without notifying', async () => {
      const generate = jest.fn<Promise<ArtifactSet>, [GenerationRequest]>();
      const { controller, deliver, registry } = createHarness({ generators: [{ name: 'spy', generate }] });

      const result = expectFailure(await controller.run(taskRequest({ secret: 'wrong-secret' })));

      expect(result.stage).toBe('Authenticated');
      expect(result.kind).toBe('AuthenticationError');
      expect(result.error).toMatchObject({ code: 'AUTH.UNAUTHENTICATED', message: 'Invalid or missing secret' });
      expect(generate).not.toHaveBeenCalled();
      expect(deliver).not.toHaveBeenCalled();
      expect(registry.inFlightCount()).toBe(0);
    });

    it('rejects every request when no secret is configured', async () => {
      const { controller } = createHarness({ settings: { sharedSecret: undefined } });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(result.kind).toBe('AuthenticationError');
    });
  });

  describe('generation', () => {
    it('falls back to the next backend on transient failure', async () => {
      const primaryGenerate = jest
        .fn<Promise<ArtifactSet>, [GenerationRequest]>()
        .mockRejectedValue(new GenerationError('overloaded', { transient: true }));
      const { controller } = createHarness({
        generators: [{ name: 'primary', generate: primaryGenerate }, new TemplateCodeGenerator()],
      });

      const result = expectSuccess(await controller.run(taskRequest()));

      expect(primaryGenerate).toHaveBeenCalledTimes(2);
      expect(result.warnings).toEqual(['Generated with fallback backend "template"']);
    });

    it('fails at Generated when every backend fails', async () => {
      const generate = jest
        .fn<Promise<ArtifactSet>, [GenerationRequest]>()
        .mockRejectedValue(new GenerationError('overloaded', { transient: true }));
      const { controller, host, deliver } = createHarness({ generators: [{ name: 'primary', generate }] });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(result.stage).toBe('Generated');
      expect(result.kind).toBe('Transient');
      expect(result.error).toMatchObject({ code: 'GENERATION.TRANSIENT', message: 'All generation backends failed', retryable: true });
      expect(host.listRepositories()).toEqual([]);
      expect(deliver).toHaveBeenCalledTimes(1);
    });

    it('fails at Generated when a backend rejects the request', async () => {
      const generate = jest.fn<Promise<ArtifactSet>, [GenerationRequest]>().mockRejectedValue(new GenerationError('refused'));
      const { controller } = createHarness({ generators: [{ name: 'primary', generate }] });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(result.kind).toBe('Fatal');
      expect(result.error.code).toBe('GENERATION.FATAL');
    });

    it('rejects an artifact set that breaks the publishing policy', async () => {
      const generate = jest
        .fn<Promise<ArtifactSet>, [GenerationRequest]>()
        .mockResolvedValue(createArtifactSet([['index.html', '<p>no license</p>']]));
      const { controller, host } = createHarness({ generators: [{ name: 'primary', generate }] });

      const result = expectFailure(await controller.run(taskRequest()));

      expect(result.stage).toBe('Generated');
      expect(result.kind).toBe('InvalidArtifactSet');
      expect(result.error.code).toBe('VALIDATION.ARTIFACT_SET');
      expect(result.error.message).toBe(
        'Generated artifact set is not publishable: missing license document (one of: LICENSE, LICENSE.md, LICENSE.txt)',
      );
      expect(host.listRepositories()).toEqual([]);
    });
  });

  describe('attachments', () => {
    const logo = toAttachment('logo.png', encodeDataUri('image/png', Buffer.from([137, 80, 78, 71])));
    const broken = toAttachment('bad.png', 'data:image/png;base64,@@@@');

    it('commits decoded attachments and skips broken ones with a warning', async () => {
      const { controller, host } = createHarness();

      const result = expectSuccess(await controller.run(taskRequest({ attachments: [logo, broken] })));

      expect(result.warnings).toEqual(['Attachment "bad.png" skipped: Attachment "bad.png" contains invalid base64']);
      const tree = host.getCommits('t1')[0].tree;
      expect([...tree.keys()]).toEqual(['index.html', 'README.md', 'LICENSE', 'logo.png']);
      expect(tree.get('logo.png')?.equals(Buffer.from([137, 80, 78, 71]))).toBe(true);
    });

    it('does not commit attachments when disabled', async () => {
      const { controller, host } = createHarness({ settings: { includeAttachments: false } });

      expectSuccess(await controller.run(taskRequest({ attachments: [logo] })));

      expect(host.getCommits('t1')[0].tree.has('logo.png')).toBe(false);
    });

    it('fails at ArtifactsDecoded when every attachment is required', async () => {
      const { controller, host, deliver } = createHarness({ settings: { requireAllAttachments: true } });

      const result = expectFailure(await controller.run(taskRequest({ attachments: [logo, broken] })));

      expect(result.stage).toBe('ArtifactsDecoded');
      expect(result.kind).toBe('MalformedEncoding');
      expect(result.error.code).toBe('VALIDATION.ATTACHMENT.MALFORMED_ENCODING');
      expect(host.listRepositories()).toEqual([]);
      expect(deliver).toHaveBeenCalledTimes(1);
    });
  });

  describe('revise', () => {
    it('fails with NotFound when no build exists and notifies the failure', async () => {
      const { controller, host, deliver } = createHarness();

      const result = expectFailure(await controller.run(taskRequest({ round: Round.Revise })));

      expect(result.stage).toBe('RepositoryLocated');
      expect(result.kind).toBe('NotFound');
      expect(result.error.code).toBe('PROVISION.NOT_FOUND');
      expect(host.listRepositories()).toEqual([]);
      expect(deliver).toHaveBeenCalledWith(
        CALLBACK,
        {
          status: 'error',
          message: 'No repository found for task "t1"',
          code: 'PROVISION.NOT_FOUND',
          email: 'student@example.com',
          task: 't1',
          round: 2,
          nonce: 'nonce-1',
        },
        'nonce-1',
      );
    });

    it('updates the existing repository in a new commit', async () => {
      const { controller, host, deliver } = createHarness();
      const built = expectSuccess(await controller.run(taskRequest()));

      const revised = expectSuccess(
        await controller.run(taskRequest({ round: Round.Revise, nonce: 'nonce-2', brief: 'hello world page v2' })),
      );

      expect(revised.repositoryUrl).toBe(built.repositoryUrl);
      expect(revised.pagesUrl).toBe('https://pagewright.pages.local/t1/');
      expect(revised.commitSha).not.toBe(built.commitSha);

      const commits = host.getCommits('t1');
      expect(commits).toHaveLength(2);
      expect(commits[1].parent).toBe(built.commitSha);
      expect(commits[1].tree.get('index.html')?.toString('utf8')).toContain('<title>hello world page v2</title>');

      expect(deliver).toHaveBeenCalledTimes(2);
      expect(deliver.mock.calls[1][1]).toMatchObject({
        status: 'success',
        message: 'Repository updated and redeployed',
        round: 2,
        nonce: 'nonce-2',
      });
    });

    it('hands the existing files to the generator', async () => {
      const generate = jest.fn<Promise<ArtifactSet>, [GenerationRequest]>(
        (request) => new TemplateCodeGenerator().generate(request),
      );
      const { controller } = createHarness({ generators: [{ name: 'spy', generate }] });
      expectSuccess(await controller.run(taskRequest()));

      expectSuccess(await controller.run(taskRequest({ round: Round.Revise })));

      const existing = generate.mock.calls[1][0].existingArtifacts;
      expect(existing && [...existing.keys()]).toEqual(['index.html', 'README.md', 'LICENSE']);
    });

    it('logs the failure category and the states entered', async () => {
      const entries: LogEntry[] = [];
      setLogHandler((entry) => entries.push(entry));
      const { controller } = createHarness();

      expectFailure(await controller.run(taskRequest({ round: Round.Revise })));

      expect(entries.find((e) => e.message === 'Pipeline run failed')?.context).toMatchObject({
        stage: 'RepositoryLocated',
        kind: 'NotFound',
        code: 'PROVISION.NOT_FOUND',
        category: 'ProvisionError',
        path: ['Authenticated', 'ArtifactsDecoded', 'Failed'],
      });
    });

    it('degrades a revise when publishing fails', async () => {
      const publisher: PagesPublisher = {
        publish: jest.fn<Promise<string>, [RepositoryHandle]>().mockRejectedValue(new PublishError('pages disabled')),
      };
      const { controller, host, deliver } = createHarness({ publisher, settings: { publishFailurePolicy: 'fail' } });
      const built = expectFailure(await controller.run(taskRequest()));
      expect(built.stage).toBe('Published');

      const revised = expectSuccess(await controller.run(taskRequest({ round: Round.Revise, nonce: 'nonce-2' })));

      expect(revised.pagesUrl).toBeNull();
      expect(revised.degraded).toBe(true);
      expect(revised.warnings).toEqual(['Publishing failed: pages disabled']);
      expect(host.getCommits('t1')).toHaveLength(2);
      expect(deliver.mock.calls[1][1]).toMatchObject({ status: 'success', pages_url: null, degraded: true, nonce: 'nonce-2' });
    });

    it('degrades a revise when the publisher rejects with an unexpected error', async () => {
      const publisher: PagesPublisher = {
        publish: jest.fn<Promise<string>, [RepositoryHandle]>().mockRejectedValue(new TypeError('fetch failed')),
      };
      const { controller, host } = createHarness({ publisher });
      expectSuccess(await controller.run(taskRequest()));

      const revised = expectSuccess(await controller.run(taskRequest({ round: Round.Revise, nonce: 'nonce-2' })));

      expect(revised.pagesUrl).toBeNull();
      expect(revised.degraded).toBe(true);
      expect(revised.warnings).toEqual(['Publishing failed: Static site host request failed']);
      expect(host.getCommits('t1')).toHaveLength(2);
    });

    it('fails closed when the repository was deleted', async () => {
      const { controller, host } = createHarness();
      expectSuccess(await controller.run(taskRequest()));
      host.deleteRepository('t1');

      const result = expectFailure(await controller.run(taskRequest({ round: Round.Revise })));

      expect(result.stage).toBe('RepositoryLocated');
      expect(result.kind).toBe('NotFound');
      expect(host.listRepositories()).toEqual([]);
    });

    it('leaves the repository untouched when regeneration fails', async () => {
      let calls = 0;
      const generate = jest.fn<Promise<ArtifactSet>, [GenerationRequest]>(async (request) => {
        calls++;
        if (calls > 1) throw new GenerationError('refused');
        return new TemplateCodeGenerator().generate(request);
      });
      const { controller, host } = createHarness({ generators: [{ name: 'primary', generate }] });
      expectSuccess(await controller.run(taskRequest()));

      const result = expectFailure(await controller.run(taskRequest({ round: Round.Revise })));

      expect(result.stage).toBe('Regenerated');
      expect(host.getCommits('t1')).toHaveLength(1);
    });
  });
});
