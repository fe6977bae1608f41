import { bootstrapExtension } from '../bootstrap.js';

const main = () => {
  const { settings, manifest, registry } = bootstrapExtension();

  console.log(
    JSON.stringify(
      {
        name: settings.name,
        version: settings.version,
        manifest,
        ...registry.describe(),
      },
      null,
      2
    )
  );
};

try {
  main();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Failed to describe extension: ${message}`);
  process.exitCode = 1;
}
