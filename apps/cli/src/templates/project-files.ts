/**
 * Starter files written by `myjob init`. Comments in the YAML double as
 * documentation of every supported key and its default.
 */
export function sampleConfig(options: { name: string; host: string }): string {
  return [
    `# myjob project configuration`,
    `name: "${options.name}"`,
    `tags: []`,
    ``,
    `connection:`,
    `  host: ${options.host}`,
    `  port: 22`,
    `  # user and key_file usually live in secret.yaml`,
    ``,
    `slurm:`,
    `  # partition: gpu`,
    `  # account: my-account`,
    `  # qos: normal`,
    `  # constraint: a100_80gb`,
    `  # array: "0-9"`,
    `  # dependency: afterok:12345`,
    `  extra_options: []`,
    ``,
    `resources:`,
    `  nodes: 1`,
    `  cpus_per_task: 4`,
    `  memory: 16G`,
    `  gpus: 0`,
    `  # gpu_type: a100`,
    `  time: "1:00:00"`,
    ``,
    `# repo_url, branch and commit default to the local checkout`,
    `# git:`,
    `#   branch: main`,
    ``,
    `execution:`,
    `  command: python train.py`,
    `  # script: scripts/run.sh`,
    `  # working_dir: src`,
    `  env_vars: {}`,
    `  modules: []`,
    `  # setup: source .venv/bin/activate`,
    `  # teardown: echo done`,
    ``,
    `output:`,
    `  stdout: logs/stdout_%j.log`,
    `  stderr: logs/stderr_%j.log`,
    `  fetch: []`,
    `  cleanup: false`,
    ``,
  ].join("\n");
}

/**
 * Empty sections are left commented out: a key with no value reads as
 * null, and null removes that section from the global secrets.
 */
export function sampleSecret(options: { user?: string }): string {
  const connection = options.user
    ? [
        `connection:`,
        `  user: ${options.user}`,
        `  # key_file: ~/.ssh/id_ed25519`,
      ]
    : [
        `# connection:`,
        `#   user: your-username`,
        `#   key_file: ~/.ssh/id_ed25519`,
      ];
  return [
    `# Merged under myjob.yaml. Keep this file out of version control.`,
    ...connection,
    ``,
    `# slurm:`,
    `#   account: my-account`,
    ``,
    `# execution:`,
    `#   env_vars:`,
    `#     WANDB_API_KEY: your-api-key`,
    ``,
  ].join("\n");
}
