// docsage - Documentation crawler, hybrid retrieval and chat

import { realpathSync } from "fs";
import { pathToFileURL } from "url";

// Re-export all types
export * from "./types";

// Errors
export * from "./errors";

// Config
export { loadConfig, saveConfig, defaultConfig, resolveDataDir, validateConfig, ConfigValidationError } from "./config";

// Storage
export * from "./storage";

// Crawler
export * from "./crawler";

// Embedding
export * from "./embedding";

// Progress
export { ProgressBus } from "./progress/bus";

// Retrieval and chat
export { HybridRetriever, reciprocalRankFusion, buildPreview } from "./retrieval/hybrid";
export { ChatService } from "./chat/service";
export { ExtractiveAnswerGenerator, OpenAIChatGenerator, createAnswerGenerator } from "./chat/generator";

// App and worker
export { createAppContext } from "./app";
export type { AppContext, AppOverrides } from "./app";
export * from "./worker";

function printUsage(): void {
  console.log("docsage - Crawl documentation sites and chat with them");
  console.log("");
  console.log("Usage: docsage <command> [options]");
  console.log("");
  console.log("Commands:");
  console.log("  serve                 Start the worker HTTP service");
  console.log("  crawl <url> [name]    Crawl a documentation site and wait for it");
  console.log("  ask <question>        Ask a question about the indexed sites");
  console.log("  sites                 List sites and their crawl status");
  console.log("  delete <id>           Delete a site and everything indexed for it");
  console.log("  clear                 Delete every site");
  console.log("");
  console.log("Examples:");
  console.log("  docsage crawl https://docs.example.com \"Example docs\"");
  console.log("  docsage ask \"how do I configure the client?\"");
}

// CLI entry point
async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "help" || command === "--help") {
    printUsage();
    return command ? 0 : 1;
  }

  const { loadConfig } = await import("./config");
  const { createAppContext } = await import("./app");
  const ctx = await createAppContext(await loadConfig());

  switch (command) {
    case "serve": {
      const { startWorkerServer } = await import("./worker");
      const server = await startWorkerServer(ctx);

      await new Promise<void>(resolve => {
        process.once("SIGINT", () => resolve());
        process.once("SIGTERM", () => resolve());
      });
      console.log("[worker] Shutting down");
      await server.stop();
      await ctx.close();
      return 0;
    }

    case "crawl": {
      const url = args[1];
      if (!url) {
        console.error("Usage: docsage crawl <url> [name]");
        await ctx.close();
        return 1;
      }

      const site = ctx.orchestrator.submit({ url, name: args.slice(2).join(" ") || undefined });
      const handle = ctx.bus.subscribe(message => {
        if (message.type === "crawl_progress" && message.siteId === site.id) {
          console.log(`[${message.progress.toFixed(1)}%] ${message.status} ${message.currentUrl ?? ""}`.trimEnd());
        }
      });

      await ctx.orchestrator.waitForJob(site.id);
      ctx.bus.unsubscribe(handle);

      const final = ctx.orchestrator.status(site.id);
      console.log(`\n${final.name} (${final.id})`);
      console.log(`Status: ${final.status}${final.error ? ` - ${final.error}` : ""}`);
      console.log(`Pages: ${final.processedUrls} processed, ${final.failedUrls} failed, ${final.totalUrls} discovered`);
      console.log(`Chunks: ${final.chunksAdded}`);
      await ctx.close();
      return final.status === "completed" ? 0 : 1;
    }

    case "ask": {
      const question = args.slice(1).join(" ");
      if (!question) {
        console.error("Usage: docsage ask <question>");
        await ctx.close();
        return 1;
      }

      const answer = await ctx.chat.answer(question);
      console.log(answer.response);
      if (answer.sources.length > 0) {
        console.log("\nSources:");
        answer.sources.forEach((source, index) => {
          console.log(`  [${index + 1}] ${source.title} - ${source.url}`);
        });
      }
      await ctx.close();
      return answer.error ? 1 : 0;
    }

    case "sites": {
      const sites = ctx.orchestrator.listSites();
      if (sites.length === 0) {
        console.log("No sites crawled yet.");
      }
      for (const site of sites) {
        console.log(`\n${site.name} (${site.url})`);
        console.log(`  ID: ${site.id}`);
        console.log(`  Status: ${site.status}${site.error ? ` - ${site.error}` : ""}`);
        console.log(`  Progress: ${site.progress}%`);
        console.log(`  Pages: ${site.processedUrls}/${site.totalUrls}, failed ${site.failedUrls}`);
        console.log(`  Chunks: ${site.chunksAdded}`);
      }
      await ctx.close();
      return 0;
    }

    case "delete": {
      const siteId = args[1];
      if (!siteId) {
        console.error("Usage: docsage delete <id>");
        await ctx.close();
        return 1;
      }
      await ctx.orchestrator.delete(siteId);
      console.log(`Deleted ${siteId}`);
      await ctx.close();
      return 0;
    }

    case "clear": {
      await ctx.orchestrator.clearAll();
      console.log("Database cleared");
      await ctx.close();
      return 0;
    }

    default:
      printUsage();
      await ctx.close();
      return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
