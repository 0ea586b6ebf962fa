import { BigNumber, ethers } from 'ethers';
import { RouterTransport } from '../types';
import { UNISWAP_V2_ROUTER_ABI } from '.';

export function createProvider(rpcUrl: string) {
  return new ethers.providers.JsonRpcProvider(rpcUrl);
}

/**
 * Calls `getAmountsOut` through ethers. Contracts are created lazily and
 * kept per router address.
 */
export class EthersRouterTransport implements RouterTransport {
  private readonly contracts = new Map<string, ethers.Contract>();

  constructor(private readonly provider: ethers.providers.Provider) {}

  async getAmountsOut(
    router: string,
    amountIn: BigNumber,
    path: string[],
  ): Promise<unknown> {
    return this.contract(router).getAmountsOut(amountIn, path);
  }

  private contract(router: string): ethers.Contract {
    let contract = this.contracts.get(router);
    if (!contract) {
      contract = new ethers.Contract(
        router,
        UNISWAP_V2_ROUTER_ABI,
        this.provider,
      );
      this.contracts.set(router, contract);
    }
    return contract;
  }
}
