export const QUERY_ALL_BALANCES_PATH = "/cosmos.bank.v1beta1.Query/AllBalances";
export const QUERY_BALANCE_PATH = "/cosmos.bank.v1beta1.Query/Balance";
export const QUERY_SUPPLY_PATH = "/cosmos.bank.v1beta1.Query/SupplyOf";
export const QUERY_WASM_CONTRACT_SMART_PATH = "/cosmwasm.wasm.v1.Query/SmartContractState";
export const QUERY_WASM_CONTRACT_INFO_PATH = "/cosmwasm.wasm.v1.Query/ContractInfo";

// Coreum token factory state, also reachable as stargate queries.
export const COREUM_QUERY_TOKEN_PATH = "/coreum.asset.ft.v1.Query/Token";
export const COREUM_QUERY_TOKENS_PATH = "/coreum.asset.ft.v1.Query/Tokens";
export const COREUM_QUERY_CLASS_PATH = "/coreum.asset.nft.v1.Query/Class";
export const COREUM_QUERY_CLASSES_PATH = "/coreum.asset.nft.v1.Query/Classes";
export const NFT_QUERY_NFT_PATH = "/cosmos.nft.v1beta1.Query/NFT";
export const NFT_QUERY_NFTS_PATH = "/cosmos.nft.v1beta1.Query/NFTs";
export const NFT_QUERY_OWNER_PATH = "/cosmos.nft.v1beta1.Query/Owner";
