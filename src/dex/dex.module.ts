import { Module } from '@nestjs/common';
import { ethers } from 'ethers';
import { SETTINGS, Settings } from '../settings/types';
import { ROUTER_TRANSPORT, RPC_PROVIDER } from './config';
import { createProvider, EthersRouterTransport } from './config/provider';
import { DexService } from './dex.service';

@Module({
  providers: [
    {
      provide: RPC_PROVIDER,
      inject: [SETTINGS],
      useFactory: (settings: Settings) => createProvider(settings.rpcUrl),
    },
    {
      provide: ROUTER_TRANSPORT,
      inject: [RPC_PROVIDER],
      useFactory: (provider: ethers.providers.Provider) =>
        new EthersRouterTransport(provider),
    },
    DexService,
  ],
  exports: [DexService],
})
export class DexModule {}
