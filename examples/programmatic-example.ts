/**
 * gettext-translate usage examples
 *
 * Run against a real key with OPENAI_API_KEY set.
 */

import {
  CatalogWorkflow,
  InlineWorkflow,
  Logger,
  TranslationClient,
  resolveApiKey,
  scanCatalog,
  translate,
} from "../src";

// Translate one message
async function singleMessage(): Promise<void> {
  try {
    const result = await translate("You have %{count} new messages", "ja");
    console.log("Translation result:", result);
  } catch (error) {
    console.error("Translation failed:", error);
  }
}

// Fill in a catalog held in memory, without touching the disk
async function inMemoryCatalog(): Promise<void> {
  const client = TranslationClient.forOpenAi(resolveApiKey(undefined), {
    modelName: "gpt-4o-mini",
    maxRetries: 3,
  });

  const po = [
    'msgid "Sign in"',
    'msgstr ""',
    "",
    'msgid "Sign out"',
    'msgstr ""',
  ].join("\n");

  const result = await scanCatalog(po, {
    language: "es",
    force: false,
    dryRun: true,
    translate: client.translatorFor("Spanish"),
    logger: new Logger(true),
  });

  console.log(`${result.changes} entries translated:\n${result.content}`);
}

// Preview both commands over a project tree
async function previewProject(root: string): Promise<void> {
  const base = {
    root,
    dryRun: true,
    apiKey: resolveApiKey(undefined),
    modelName: "gpt-4o-mini",
    verbose: true,
    maxRetries: 5,
    retryDelay: 100,
  };

  const catalogs = await new CatalogWorkflow({
    ...base,
    root: `${root}/priv/gettext`,
    languages: ["de", "fr"],
    force: false,
    extension: ".po",
  }).execute();
  console.log(`${catalogs.entries} catalog entries would change`);

  const inline = await new InlineWorkflow({
    ...base,
    root: `${root}/lib`,
    extension: ".ex",
    functionNames: ["gettext"],
  }).execute();
  console.log(`${inline.changedFiles.length} source files would change`);
}

async function main(): Promise<void> {
  await singleMessage();
  await inMemoryCatalog();
  await previewProject(process.cwd());
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
