// packages/core/src/workflow/scaffold.ts — Starter document for `runbook new`

/** Lower-case, dash-separated file and workflow name. */
export function slugifyWorkflowName(name: string): string {
  return name.trim().replace(/\s+/g, '-').toLowerCase();
}

/**
 * A commented starter workflow. Placeholders are `${name}`; commands that use
 * them are written as block scalars so YAML never sees a flow mapping.
 */
export function generateWorkflowTemplate(name: string, description?: string): string {
  const slug = slugifyWorkflowName(name);
  const desc = description ?? 'A runbook workflow';

  return `name: ${slug}
description: ${JSON.stringify(desc)}
version: "1.0.0"

steps:
  - name: hello
    run: echo "Hello from ${slug}!"
    output: greeting

  - name: show-greeting
    when: greeting != ""
    run: |
      echo "Previous step said: \${greeting}"

# Workflow features (uncomment to use):
#
# Triggers (advisory):
#   triggers:
#     schedule: "0 9 * * *"
#     manual: true
#
# Variables:
#   env:
#     TARGET: "staging"
#
# Conditional execution:
#   - name: deploy
#     when: TARGET == "staging" && !dry
#     run: ./deploy.sh \${TARGET}
#
# Retries and timeout (seconds):
#   - name: fetch
#     run: curl -fsS https://example.com/health
#     retries: 3
#     retry_delay: 5
#     timeout: 30
#
# Continue on error:
#   - name: optional-step
#     run: ./might-fail.sh
#     continue_on_error: true
#
# Error handlers (\${error} and \${failed_step} are available):
#   on_error:
#     - notify: "Workflow failed at \${failed_step}: \${error}"
#     - run: ./cleanup.sh
`;
}
