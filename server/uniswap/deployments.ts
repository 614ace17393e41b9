import { type Address } from "viem";
import { type EvmChainName } from "../engine/config";

export interface V2Deployment {
  factory: Address;
  router: Address;
}

export type V3RouterKind = "SwapRouter" | "SwapRouter02";

export interface V3Deployment {
  factory: Address;
  router: Address;
  routerKind: V3RouterKind;
}

export const UNISWAP_V2_DEPLOYMENTS: Record<EvmChainName, V2Deployment> = {
  ethereum: {
    factory: "0x5C69bEe701ef814a2B6a3EDD4B1652CB9cc5aA6f",
    router: "0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D",
  },
  ethereum_sepolia: {
    factory: "0xF62c03E08ada871A0bEb309762E260a7a6a880E6",
    router: "0xeE567Fe1712Faf6149d80dA1E6934E354124CfE3",
  },
  base: {
    factory: "0x8909Dc15e40173Ff4699343b6eB8132c65e18eC6",
    router: "0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24",
  },
  base_sepolia: {
    factory: "0x7Ae58f10f7849cA6F5fB71b7f45CB416c9204b1e",
    router: "0x1689E7B1F10000AE47eBfE339a4f69dECd19F602",
  },
};

export const UNISWAP_V3_DEPLOYMENTS: Record<EvmChainName, V3Deployment> = {
  ethereum: {
    factory: "0x1F98431c8aD98523631AE4a59f267346ea31F984",
    router: "0xE592427A0AEce92De3Edee1F18E0157C05861564",
    routerKind: "SwapRouter",
  },
  ethereum_sepolia: {
    factory: "0x0227628f3F023bb0B980b67D528571c95c6DaC1c",
    router: "0x3bFA4769FB09eefC5a80d6E87c3B9C650f7Ae48E",
    routerKind: "SwapRouter02",
  },
  base: {
    factory: "0x33128a8fC17869897dcE68Ed026d694621f6FDfD",
    router: "0x2626664c2603336E57B271c5C0b26F421741e481",
    routerKind: "SwapRouter02",
  },
  base_sepolia: {
    factory: "0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24",
    router: "0x94cC0AaC535CCDB3C01d6787D6413C739ae12bc4",
    routerKind: "SwapRouter02",
  },
};
