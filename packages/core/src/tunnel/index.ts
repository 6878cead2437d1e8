export { describeSession, SSH_SESSION_DOCUMENT } from './descriptor.js';
export { quoteShellArg, joinShellArgs } from './shell-quote.js';
export {
  buildInvocation,
  buildProxyCommand,
  escapeSshTokens,
  BROKER_ACTION,
  NULL_DEVICE,
  type InvocationOptions,
  type ProxyCommandOptions,
  type SshInvocation,
} from './invocation.js';
