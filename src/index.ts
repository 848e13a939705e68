#!/usr/bin/env node
import commandLineArgs from 'command-line-args';
import commandLineUsage from 'command-line-usage';

import * as fs from 'fs';
import * as YAML from 'yaml';
import { Appservice, SimpleRetryJoinStrategy } from 'matrix-bot-sdk';

import { loadConfig, createRegistration, loadRegTokens } from './config';
import { Bridge } from './bridge';
import { SqliteBridgeDatabase } from './database';
import { BridgeHTTPServer } from './httpserver';
import { TtlCache } from './cache';
import { IdentityMappingStore } from './mapping';
import { DirectRoomManager, OtherParticipantResolver } from './rooms';
import { SyncEngine, SyncPositionStore } from './sync';
import { HttpMediaFetcher, SendEngine } from './send';
import { PnmPushGateway, PushService } from './push';
import { HttpCredentialValidator } from './auth';
import { MatrixWireClient } from './wire';
import { getLogger, setLogLevel } from './log';

const log = getLogger('main');

const commandOptions = [
  { name: 'register', alias: 'r', type: Boolean },
  { name: 'registration-file', alias: 'f', type: String },
  { name: 'config', alias: 'c', type: String },
  { name: 'mappings', alias: 'm', type: String },
  { name: 'help', alias: 'h', type: Boolean },
];
const options = {
  register: false,
  'registration-file': 'registration.yaml',
  config: 'config.yaml',
  mappings: '',
  help: false,
  ...commandLineArgs(commandOptions),
};

// if we asked for help, just display the help and exit
if (options.help) {
  // tslint:disable-next-line:no-console
  console.log(commandLineUsage([
    {
      header: 'Softphone Matrix Bridge',
      content: 'Lets softphone users send and fetch messages by number through Matrix direct rooms',
    },
    {
      header: 'Options',
      optionList: commandOptions,
    },
  ]));
  process.exit(0);
}

const config = loadConfig(options.config);
setLogLevel(config.logging.level);

const registration = createRegistration({
  id: 'softphone-bridge',
  url: `http://${config.bridge.bindAddress}:${config.bridge.port}`,
  localpart: '_softphone_bot',
  homeserverName: config.bridge.homeserverName,
});

if (options.register) {
  try {
    fs.writeFileSync(
      options['registration-file'],
      YAML.stringify(registration),
    );
  } catch (err) {
    // tslint:disable-next-line:no-console
    console.log("Couldn't generate registration file:", err);
    process.exit(1);
  }
  process.exit(0);
}

Object.assign(registration, loadRegTokens(options['registration-file']));

const storage = new SqliteBridgeDatabase({ file: config.database.filename });

const appservice = new Appservice({
  ...config.bridge,
  registration,
  storage,
  joinStrategy: new SimpleRetryJoinStrategy(),
});

const ttl = config.cache.ttlSeconds * 1000;
const wire = MatrixWireClient.fromAppservice(appservice, config.bridge.homeserverName);
const mappings = new IdentityMappingStore();
const rooms = new DirectRoomManager(wire, new TtlCache<string>({ ttl }));
const participants = new OtherParticipantResolver(
  wire,
  mappings,
  new TtlCache<string[]>({ ttl }),
  new TtlCache<string>({ ttl }),
);

const bridge = new Bridge({
  wire,
  mappings,
  sender: new SendEngine(wire, mappings, rooms, new HttpMediaFetcher()),
  sync: new SyncEngine(wire, mappings, new SyncPositionStore(), participants),
  push: new PushService(storage, new PnmPushGateway(config.push.gatewayUrl)),
  pushTokens: storage,
  credentials: config.auth && new HttpCredentialValidator({
    url: config.auth.url,
    homeserverName: config.bridge.homeserverName,
    timeout: config.auth.timeoutSeconds * 1000,
    chatClaim: config.auth.chatClaim,
    cache: new TtlCache<boolean>({ ttl }),
  }),
  publicBaseURL: config.httpserver.publicBaseURL,
});

const httpserver = new BridgeHTTPServer(
  {
    port: config.httpserver.port,
    bindAddress: config.httpserver.bindAddress,
    adminToken: config.admin.token || registration.as_token,
  },
  bridge,
  storage,
);

async function main(): Promise<void> {
  const mappings_file = options.mappings || config.mappings.file;
  if (mappings_file) {
    mappings.loadFile(mappings_file);
  }
  await appservice.begin();
  log.info(`Application service listening on ${config.bridge.bindAddress}:${config.bridge.port}`);
  await httpserver.listen();
}

main().catch((e) => {
  log.error(`Failed to start: ${e}`);
  process.exit(1);
});
