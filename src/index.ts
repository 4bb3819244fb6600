import { WallweaverServer } from "./server.js";

const server = new WallweaverServer();
server.run().catch(console.error);
