// nodes7 ships no type declarations and has no @types package.

declare module 'nodes7' {
  class NodeS7 {
    constructor(options?: NodeS7.Options);

    /** 0 = disconnected, 4 = connected and negotiated */
    isoConnectionState: number;

    initiateConnection(params: NodeS7.ConnectionParams, callback: (err?: unknown) => void): void;
    dropConnection(callback?: () => void): void;
    addItems(items: string | string[]): void;
    removeItems(items?: string | string[]): void;
    readAllItems(callback: (anythingBad: boolean, values: Record<string, NodeS7.ItemValue>) => void): void;
  }

  namespace NodeS7 {
    interface Options {
      silent?: boolean;
      debug?: boolean;
    }

    interface ConnectionParams {
      host: string;
      port?: number;
      rack?: number;
      slot?: number;
      timeout?: number;
      localTSAP?: number;
      remoteTSAP?: number;
      doNotOptimize?: boolean;
    }

    type ItemValue = number | boolean | string | null | Array<number | boolean>;
  }

  export = NodeS7;
}
