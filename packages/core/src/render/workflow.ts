import { stringify } from 'yaml';
import type { PipelineConfig, TaskName } from '@devtasks/shared';
import type { PlatformAdapter } from '../platform/adapter.js';
import { platformForRunner } from '../platform/detect.js';

interface WorkflowStep {
  name?: string;
  uses?: string;
  with?: Record<string, string>;
  run?: string;
}

function invoke(adapter: PlatformAdapter, task: TaskName): string {
  return adapter.kind === 'windows'
    ? `.\\ci\\win32\\${task}${adapter.scriptExtension}`
    : `./ci/${adapter.scriptDir}/${task}${adapter.scriptExtension}`;
}

/**
 * GitHub Actions workflow running the generated scripts for one platform
 * across the configured OS labels and interpreter versions.
 */
export function renderWorkflow(config: PipelineConfig, adapter: PlatformAdapter): string {
  const osLabels = config.matrix.os.filter((os) => platformForRunner(os) === adapter.kind);

  const exclude = config.matrix.exclude
    .filter((rule) => rule.os === undefined || osLabels.includes(rule.os))
    .map((rule) => ({
      ...(rule.os !== undefined ? { os: rule.os } : {}),
      ...(rule.python !== undefined ? { 'python-version': rule.python } : {}),
    }));

  const steps: WorkflowStep[] = [
    { uses: 'actions/checkout@v4' },
    {
      name: 'Set up Python ${{ matrix.python-version }}',
      uses: 'actions/setup-python@v5',
      with: { 'python-version': '${{ matrix.python-version }}', cache: 'pip' },
    },
    {
      name: 'Create environment and install dependencies',
      run: `${invoke(adapter, 'create_venv')}\n${invoke(adapter, 'install_dependencies')}\n`,
    },
    { name: 'Run lint', run: invoke(adapter, 'lint') },
    { name: 'Run unit tests', run: invoke(adapter, 'test_unit') },
    { name: 'Run typecheck', run: invoke(adapter, 'typecheck') },
  ];

  if (config.pipeline.includeBuild) {
    steps.push({ name: 'Build package', run: invoke(adapter, 'build_package') });
  }

  const workflow = {
    name: `Build-Test-Lint (${adapter.scriptDir})`,
    on: {
      pull_request: {
        types: config.triggers.pullRequest,
      },
    },
    jobs: {
      build: {
        'runs-on': '${{ matrix.os }}',
        strategy: {
          'fail-fast': config.matrix.failFast,
          matrix: {
            os: osLabels,
            'python-version': config.matrix.python,
            ...(exclude.length > 0 ? { exclude } : {}),
          },
        },
        steps,
      },
    },
  };

  return stringify(workflow, { lineWidth: 0 });
}
