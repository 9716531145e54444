export * from "@nvim-host-kit/lib";
