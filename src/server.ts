import { S3Client } from "@aws-sdk/client-s3";
import { createApp } from "./app";
import { cfg, getSessionSecret } from "./config";
import { logger } from "./logger";
import {
  MemoryObjectStore,
  ObjectStore,
  S3ObjectStore,
} from "./services/objectStore";
import { UserStore } from "./services/userStore";
import { UserService } from "./services/users";
import { TemplateLoader } from "./views/templates";
import { PageRenderer } from "./views/page";

function objectStore(): ObjectStore {
  if (cfg.storageBucket) {
    const s3 = new S3Client({ region: cfg.region });
    return new S3ObjectStore(cfg.storageBucket, s3);
  }
  logger.warn("STORAGE_BUCKET not set, users are kept in memory");
  return new MemoryObjectStore();
}

const images = {
  imageUrl: cfg.defaultImageUrl,
  headerImageUrl: cfg.defaultHeaderImageUrl,
};

const app = createApp({
  users: new UserService(
    new UserStore(objectStore(), cfg.usersPrefix),
    images
  ),
  pages: new PageRenderer(new TemplateLoader(cfg.templatesDir)),
  images,
  sessionSecret: getSessionSecret(),
  csrf: cfg.csrfEnabled,
  corsOrigins: cfg.corsOrigins,
  publicDir: cfg.publicDir,
});

app.listen(cfg.port, () => logger.info(`listening on :${cfg.port}`));
