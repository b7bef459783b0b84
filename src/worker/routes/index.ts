// Route handlers barrel export

export { handleHealth, VERSION } from "./health";
export {
  handleListSites,
  handleCreateSite,
  handleGetSite,
  handleDeleteSite,
  handleRecrawl,
  handleClearDatabase,
} from "./sites";
export { handleChat, wantsEventStream } from "./chat";
export { handleEvents } from "./events";
